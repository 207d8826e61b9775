import { describe, expect, it } from "vitest";
import { parseCommand } from "./commands.js";
import { UsageError } from "./errors.js";

describe("parseCommand", () => {
	it("defaults to today", () => {
		expect(parseCommand([])).toEqual({
			command: { kind: "query", range: { kind: "today" } },
			options: { json: false, color: true, manual: false, verbose: false },
		});
	});

	it("maps subcommands and aliases to ranges", () => {
		expect(parseCommand(["tomorrow"]).command).toEqual({ kind: "query", range: { kind: "tomorrow" } });
		expect(parseCommand(["tmr"]).command).toEqual({ kind: "query", range: { kind: "tomorrow" } });
		expect(parseCommand(["w"]).command).toEqual({ kind: "query", range: { kind: "week" } });
		expect(parseCommand(["t"]).command).toEqual({ kind: "query", range: { kind: "today" } });
	});

	it("parses the date argument", () => {
		expect(parseCommand(["date", "2026/10/19"]).command).toEqual({
			kind: "query",
			range: { kind: "date", date: { year: 2026, month: 10, day: 19 } },
		});
		expect(parseCommand(["d", "2026-01-02"]).command).toEqual({
			kind: "query",
			range: { kind: "date", date: { year: 2026, month: 1, day: 2 } },
		});
	});

	it("reads global options in any position", () => {
		expect(parseCommand(["--json", "week", "--no-color", "--manual", "--verbose"])).toEqual({
			command: { kind: "query", range: { kind: "week" } },
			options: { json: true, color: false, manual: true, verbose: true },
		});
	});

	it("parses configure actions", () => {
		expect(parseCommand(["configure", "reset"]).command).toEqual({ kind: "configure-reset", all: false });
		expect(parseCommand(["configure", "reset", "--all"]).command).toEqual({ kind: "configure-reset", all: true });
		expect(parseCommand(["configure", "oauth"]).command).toEqual({
			kind: "configure-oauth",
			path: undefined,
			paste: false,
		});
		expect(parseCommand(["configure", "oauth", "--path", "client.json"]).command).toEqual({
			kind: "configure-oauth",
			path: "client.json",
			paste: false,
		});
		expect(parseCommand(["configure", "oauth", "--paste"]).command).toEqual({
			kind: "configure-oauth",
			path: undefined,
			paste: true,
		});
	});

	it("recognizes help", () => {
		expect(parseCommand(["--help"]).command).toEqual({ kind: "help" });
		expect(parseCommand(["-h", "week"]).command).toEqual({ kind: "help" });
		expect(parseCommand(["help"]).command).toEqual({ kind: "help" });
	});

	it("rejects unknown subcommands", () => {
		expect(() => parseCommand(["yesterday"])).toThrow("Unknown command: yesterday");
		expect(() => parseCommand(["constructor"])).toThrow(UsageError);
	});

	it("rejects unknown options", () => {
		expect(() => parseCommand(["today", "--bogus"])).toThrow(UsageError);
	});

	it("rejects missing, invalid and extra arguments", () => {
		expect(() => parseCommand(["date"])).toThrow("Missing date. Usage: calm date <YYYY-MM-DD>");
		expect(() => parseCommand(["date", "2026-02-31"])).toThrow(UsageError);
		expect(() => parseCommand(["date", "2026-10-19", "2026-10-20"])).toThrow("Unexpected argument: 2026-10-20");
		expect(() => parseCommand(["today", "extra"])).toThrow("Unexpected argument: extra");
	});

	it("rejects bad configure usage", () => {
		expect(() => parseCommand(["configure"])).toThrow("Missing action: oauth|reset");
		expect(() => parseCommand(["configure", "wipe"])).toThrow("Unknown action: configure wipe");
		expect(() => parseCommand(["configure", "oauth", "--path", "a.json", "--paste"])).toThrow(UsageError);
	});

	it("rejects options the command does not take", () => {
		expect(() => parseCommand(["today", "--all"])).toThrow("Option --all does not apply to today");
		expect(() => parseCommand(["week", "--path", "x.json"])).toThrow("Option --path does not apply to week");
		expect(() => parseCommand(["configure", "reset", "--paste"])).toThrow(
			"Option --paste does not apply to configure reset",
		);
		expect(() => parseCommand(["configure", "oauth", "--json"])).toThrow(UsageError);
		expect(() => parseCommand(["configure", "reset", "--manual"])).toThrow(UsageError);
		expect(() => parseCommand(["--no-color", "configure", "oauth"])).toThrow(UsageError);
	});

	it("accepts the options each command takes", () => {
		expect(parseCommand(["configure", "oauth", "--manual", "--verbose"]).options).toEqual({
			json: false,
			color: true,
			manual: true,
			verbose: true,
		});
		expect(parseCommand(["configure", "reset", "--all", "--verbose"]).command).toEqual({
			kind: "configure-reset",
			all: true,
		});
		expect(parseCommand(["--all", "--help"]).command).toEqual({ kind: "help" });
	});
});
