import { type AppDeps, type Output, runCommand } from "./app.js";
import { Authenticator } from "./auth.js";
import { InteractiveConsentFlow, ManualConsentFlow } from "./calendar-oauth-flow.js";
import { CalendarService } from "./calendar-service.js";
import { HELP, type ParsedCommand, parseCommand } from "./commands.js";
import { loadConfig } from "./config.js";
import { CredentialStore } from "./credential-store.js";
import { UsageError, errorMessage } from "./errors.js";
import { GoogleOAuthProvider } from "./google-oauth-provider.js";
import { setDebug } from "./log.js";

/** Process surroundings of a CLI run. */
export interface CliIo {
	env: NodeJS.ProcessEnv;
	stdout: Output;
	stderr: Output;
	isTTY: boolean;
	/** Defaults to process.stdin. */
	stdin?: NodeJS.ReadableStream;
}

export const processIo: CliIo = {
	env: process.env,
	stdout: { log: (line) => console.log(line) },
	stderr: { log: (line) => console.error(line) },
	isTTY: process.stdout.isTTY === true,
};

function usage(io: CliIo, message: string): number {
	io.stderr.log(`Error: ${message}`);
	io.stderr.log("");
	io.stderr.log(HELP);
	return 1;
}

function error(io: CliIo, msg: string): number {
	io.stderr.log(`Error: ${msg}`);
	return 1;
}

/** Runs one CLI invocation and returns its exit code. */
export async function main(argv: string[], io: CliIo = processIo): Promise<number> {
	let parsed: ParsedCommand;
	try {
		parsed = parseCommand(argv);
	} catch (e) {
		if (e instanceof UsageError) return usage(io, e.message);
		return error(io, errorMessage(e));
	}

	try {
		const config = loadConfig(io.env);
		setDebug(config.debug || parsed.options.verbose);
		parsed.options.color = parsed.options.color && config.color && io.isTTY;

		const store = new CredentialStore(config.paths);
		const deps: AppDeps = {
			store,
			authenticator: new Authenticator({
				store,
				provider: new GoogleOAuthProvider(),
				flow: parsed.options.manual
					? new ManualConsentFlow()
					: new InteractiveConsentFlow({ print: (line) => io.stdout.log(line) }),
			}),
			createEventSource: ({ credential, token }) =>
				CalendarService.fromSession(credential, token, {
					calendarId: config.calendarId,
					timeZone: config.timeZone,
					onTokens: (refreshed) => store.saveToken(refreshed),
				}),
			now: () => new Date(),
			output: io.stdout,
			stdin: io.stdin,
		};

		await runCommand(parsed, deps);
		return 0;
	} catch (e) {
		return error(io, errorMessage(e));
	}
}
