import * as readline from "readline";
import type { AuthenticatedSession, Authenticator } from "./auth.js";
import type { EventSource } from "./calendar-service.js";
import { type GlobalOptions, type ParsedCommand, HELP } from "./commands.js";
import type { CredentialStore } from "./credential-store.js";
import { resolveWindow } from "./date-range.js";
import { ConfigurationError } from "./errors.js";
import { formatEvents } from "./event-formatter.js";
import type { QueryWindow } from "./types.js";

export interface Output {
	log(line: string): void;
}

export interface AppDeps {
	store: CredentialStore;
	authenticator: Authenticator;
	createEventSource(session: AuthenticatedSession): EventSource;
	now(): Date;
	output: Output;
	/** Source for `configure oauth --paste`. */
	stdin?: NodeJS.ReadableStream;
}

/** Reads lines until one that is exactly END (or end of input). */
export async function readPastedJson(input: NodeJS.ReadableStream): Promise<string> {
	const rl = readline.createInterface({ input, terminal: false });
	const lines: string[] = [];
	try {
		for await (const line of rl) {
			if (line.trim() === "END") break;
			lines.push(line);
		}
	} finally {
		rl.close();
	}
	return lines.join("\n");
}

async function queryEvents(window: QueryWindow, options: GlobalOptions, deps: AppDeps): Promise<void> {
	const session = await deps.authenticator.ensureAuthenticated();
	const events = await deps.createEventSource(session).listEvents(window);

	if (options.json) {
		deps.output.log(JSON.stringify(events, null, 2));
		return;
	}
	for (const line of formatEvents(events, { now: deps.now(), color: options.color })) {
		deps.output.log(line);
	}
}

function configureReset(all: boolean, deps: AppDeps): void {
	if (all) {
		const removed = deps.store.deleteCredential();
		deps.output.log(removed ? "Deleted credentials.json" : "No credentials.json to delete");
	}
	const removed = deps.store.deleteToken();
	deps.output.log(removed ? "Deleted token (you will be asked to authorize on the next run)" : "No token to delete");
}

async function configureOAuth(source: { path?: string; paste: boolean }, deps: AppDeps): Promise<void> {
	let imported = false;
	if (source.paste) {
		deps.output.log("Paste the complete credentials.json, then a line containing only END:");
		deps.store.importCredential(await readPastedJson(deps.stdin ?? process.stdin));
		imported = true;
	} else if (source.path !== undefined) {
		deps.store.importCredentialFile(source.path);
		imported = true;
	} else if (!deps.store.loadCredential()) {
		throw new ConfigurationError(
			`No OAuth client at ${deps.store.paths.credentialsFile}. Use --path <credentials.json> or --paste`,
		);
	}

	if (imported) {
		deps.output.log(`OAuth client saved to ${deps.store.paths.credentialsFile}`);
		// consent replaces the stored token on success; a failed attempt leaves it as it was
		await deps.authenticator.authorize();
	} else {
		await deps.authenticator.ensureAuthenticated();
	}
	deps.output.log("OAuth configuration completed");
}

export async function runCommand({ command, options }: ParsedCommand, deps: AppDeps): Promise<void> {
	switch (command.kind) {
		case "help":
			deps.output.log(HELP);
			return;
		case "query":
			return queryEvents(resolveWindow(command.range, deps.now()), options, deps);
		case "configure-reset":
			configureReset(command.all, deps);
			return;
		case "configure-oauth":
			return configureOAuth(command, deps);
	}
}
