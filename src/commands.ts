import { parseArgs } from "util";
import { parseCalendarDate, type QueryRange } from "./date-range.js";
import { UsageError, errorMessage } from "./errors.js";

export const HELP = `calm - print your Google Calendar events

USAGE

  calm [command] [options]

EVENT COMMANDS

  calm today                     Events for today (default; alias: t)
  calm tomorrow                  Events for tomorrow (alias: tmr)
  calm week                      Events for this week, Monday to Sunday (alias: w)
  calm date <YYYY-MM-DD>         Events for a given date, also YYYY/MM/DD (alias: d)

  Options:
    --json                       Print the raw event list as JSON
    --no-color                   Disable colors
    --manual                     Authorize without a local browser (paste the redirect URL)
    --verbose                    Log token and API activity to stderr

CONFIGURE COMMANDS

  calm configure oauth --path <credentials.json>
      Import a Desktop OAuth client downloaded from the Google Cloud console and authorize.
  calm configure oauth --paste
      Same, reading the JSON from stdin up to a line containing only END.
  calm configure oauth
      Check the stored OAuth client and authorize if no usable token exists.
  calm configure reset [--all]
      Delete the session token (with --all, the OAuth client too).

EXAMPLES

  calm
  calm week --json
  calm date 2026-10-19
  calm configure oauth --path ~/Downloads/client_secret.json

DATA STORAGE

  ~/.calm/credentials.json   OAuth client credentials (override the directory with CALM_HOME)
  ~/.calm/token.json         Session token`;

export interface GlobalOptions {
	json: boolean;
	color: boolean;
	manual: boolean;
	verbose: boolean;
}

export type Command =
	| { kind: "help" }
	| { kind: "query"; range: QueryRange }
	| { kind: "configure-reset"; all: boolean }
	| { kind: "configure-oauth"; path?: string; paste: boolean };

export interface ParsedCommand {
	command: Command;
	options: GlobalOptions;
}

const RANGE_ALIASES = new Map<string, "today" | "tomorrow" | "week" | "date">([
	["today", "today"],
	["t", "today"],
	["tomorrow", "tomorrow"],
	["tmr", "tomorrow"],
	["week", "week"],
	["w", "week"],
	["date", "date"],
	["d", "date"],
]);

function parse(argv: string[]) {
	try {
		return parseArgs({
			args: argv,
			options: {
				json: { type: "boolean" },
				"no-color": { type: "boolean" },
				manual: { type: "boolean" },
				verbose: { type: "boolean" },
				all: { type: "boolean" },
				path: { type: "string" },
				paste: { type: "boolean" },
				help: { type: "boolean", short: "h" },
			},
			allowPositionals: true,
			strict: true,
		});
	} catch (e) {
		throw new UsageError(errorMessage(e), { cause: e });
	}
}

type ParsedValues = ReturnType<typeof parse>["values"];
type ActionCommand = Exclude<Command, { kind: "help" }>;

/** Options each command takes; anything else given with it is a usage error. */
const COMMAND_OPTIONS: Record<ActionCommand["kind"], readonly string[]> = {
	query: ["json", "no-color", "manual", "verbose"],
	"configure-reset": ["all", "verbose"],
	"configure-oauth": ["path", "paste", "manual", "verbose"],
};

function expectNoMore(rest: string[]): void {
	if (rest.length > 0) {
		throw new UsageError(`Unexpected argument: ${rest[0]}`);
	}
}

function parseConfigure(action: string | undefined, rest: string[], values: ParsedValues): ActionCommand {
	expectNoMore(rest);
	switch (action) {
		case "reset":
			return { kind: "configure-reset", all: values.all ?? false };
		case "oauth":
			if (values.path !== undefined && values.paste) {
				throw new UsageError("Use either --path or --paste, not both");
			}
			return { kind: "configure-oauth", path: values.path, paste: values.paste ?? false };
		case undefined:
			throw new UsageError("Missing action: oauth|reset");
		default:
			throw new UsageError(`Unknown action: configure ${action}`);
	}
}

function parseQuery(subcommand: string, rest: string[]): ActionCommand {
	const range = RANGE_ALIASES.get(subcommand);
	if (!range) {
		throw new UsageError(`Unknown command: ${subcommand}`);
	}
	if (range !== "date") {
		expectNoMore(rest);
		return { kind: "query", range: { kind: range } };
	}

	const [date, ...extra] = rest;
	if (!date) {
		throw new UsageError("Missing date. Usage: calm date <YYYY-MM-DD>");
	}
	expectNoMore(extra);
	return { kind: "query", range: { kind: "date", date: parseCalendarDate(date) } };
}

export function parseCommand(argv: string[]): ParsedCommand {
	const { values, positionals } = parse(argv);
	const options: GlobalOptions = {
		json: values.json ?? false,
		color: !values["no-color"],
		manual: values.manual ?? false,
		verbose: values.verbose ?? false,
	};

	const [first = "today", ...rest] = positionals;
	if (values.help || first === "help") {
		return { command: { kind: "help" }, options };
	}

	const isConfigure = first === "configure";
	const command = isConfigure ? parseConfigure(rest[0], rest.slice(1), values) : parseQuery(first, rest);
	const accepted = COMMAND_OPTIONS[command.kind];
	for (const [name, value] of Object.entries(values)) {
		if (value !== undefined && !accepted.includes(name)) {
			throw new UsageError(`Option --${name} does not apply to ${isConfigure ? `configure ${rest[0]}` : first}`);
		}
	}
	return { command, options };
}
