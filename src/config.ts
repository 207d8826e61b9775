import * as os from "os";
import * as path from "path";
import type { CalmPaths } from "./types.js";

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar.readonly"];

export interface CalmConfig {
	paths: CalmPaths;
	calendarId: string;
	timeZone: string;
	debug: boolean;
	color: boolean;
}

export function resolvePaths(configDir: string): CalmPaths {
	return {
		configDir,
		credentialsFile: path.join(configDir, "credentials.json"),
		tokenFile: path.join(configDir, "token.json"),
	};
}

function isTruthy(value: string | undefined): boolean {
	return value === "1" || value?.toLowerCase() === "true";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CalmConfig {
	const configDir = env.CALM_HOME || path.join(os.homedir(), ".calm");
	return {
		paths: resolvePaths(configDir),
		calendarId: env.CALM_CALENDAR_ID || "primary",
		timeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
		debug: isTruthy(env.CALM_DEBUG),
		color: env.NO_COLOR === undefined,
	};
}
