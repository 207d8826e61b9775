import { PassThrough } from "stream";
import { describe, expect, it } from "vitest";
import {
	type ConsentUrlBuilder,
	InteractiveConsentFlow,
	ManualConsentFlow,
	ScriptedConsentFlow,
	extractAuthorizationCode,
} from "./calendar-oauth-flow.js";
import { AuthenticationError } from "./errors.js";

const buildUrl: ConsentUrlBuilder = (redirectUri, state) =>
	`https://auth.example.test/consent?redirect_uri=${encodeURIComponent(redirectUri)}&state=${state}`;

function consentParams(url: string) {
	const params = new URL(url).searchParams;
	return { redirectUri: params.get("redirect_uri"), state: params.get("state") };
}

/** Plays the browser: follows the consent URL straight back to the redirect URI. */
function redirectingBrowser(query: string) {
	const responses: Promise<Response>[] = [];
	const open = (url: string) => {
		const { redirectUri, state } = consentParams(url);
		responses.push(fetch(`${redirectUri}/?${query}&state=${state}`));
	};
	return { open, responses };
}

describe("InteractiveConsentFlow", () => {
	it("receives the code on the loopback redirect", async () => {
		const browser = redirectingBrowser("code=test-code&scope=calendar");
		const printed: string[] = [];
		const flow = new InteractiveConsentFlow({ openBrowser: browser.open, print: (line) => printed.push(line) });

		const grant = await flow.authorize(buildUrl);

		expect(grant.code).toBe("test-code");
		expect(grant.redirectUri).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
		expect(printed[2]).toMatch(/^https:\/\/auth\.example\.test\/consent\?redirect_uri=.+&state=[0-9a-f]{32}$/);
		const response = await browser.responses[0];
		expect(response?.status).toBe(200);
	});

	it("fails when the user denies access", async () => {
		const browser = redirectingBrowser("error=access_denied");
		const flow = new InteractiveConsentFlow({ openBrowser: browser.open, print: () => {} });

		await expect(flow.authorize(buildUrl)).rejects.toThrow("Authorization denied: access_denied");
		const response = await browser.responses[0];
		expect(response?.status).toBe(400);
	});

	it("ignores redirects that carry another state", async () => {
		const statuses: number[] = [];
		const open = (url: string) => {
			const { redirectUri, state } = consentParams(url);
			void (async () => {
				statuses.push((await fetch(`${redirectUri}/?code=forged-code&state=forged`)).status);
				statuses.push((await fetch(`${redirectUri}/?error=access_denied`)).status);
				statuses.push((await fetch(`${redirectUri}/?code=real-code&state=${state}`)).status);
			})();
		};
		const flow = new InteractiveConsentFlow({ openBrowser: open, print: () => {} });

		const grant = await flow.authorize(buildUrl);

		expect(grant.code).toBe("real-code");
		await expect.poll(() => statuses).toEqual([400, 400, 200]);
	});

	it("times out when nobody completes the flow", async () => {
		const flow = new InteractiveConsentFlow({ timeoutMs: 50, openBrowser: () => {}, print: () => {} });

		await expect(flow.authorize(buildUrl)).rejects.toThrow(AuthenticationError);
	});
});

describe("ManualConsentFlow", () => {
	it("reads the code from a pasted redirect URL", async () => {
		const input = new PassThrough();
		const output = new PassThrough();
		let printed = "";
		output.on("data", (chunk) => {
			printed += String(chunk);
		});
		const flow = new ManualConsentFlow({ input, output });

		let state = "";
		const result = flow.authorize((redirectUri, requested) => {
			state = requested;
			return buildUrl(redirectUri, requested);
		});
		input.write(`http://localhost/?code=pasted-code&state=${state}&scope=calendar\n`);

		await expect(result).resolves.toEqual({ code: "pasted-code", redirectUri: "http://localhost" });
		expect(printed).toContain(buildUrl("http://localhost", state));
	});

	it("rejects a pasted redirect URL from another authorization", async () => {
		const input = new PassThrough();
		const flow = new ManualConsentFlow({ input, output: new PassThrough() });

		const result = flow.authorize(buildUrl);
		input.write("http://localhost/?code=pasted-code&state=stale\n");

		await expect(result).rejects.toThrow("Authorization state mismatch; start the authorization again");
	});
});

describe("extractAuthorizationCode", () => {
	it("accepts a bare code", () => {
		expect(extractAuthorizationCode("  4/abc-code \n")).toBe("4/abc-code");
	});

	it("checks the state of a pasted URL", () => {
		expect(extractAuthorizationCode("http://localhost/?code=c&state=s1", "s1")).toBe("c");
		expect(() => extractAuthorizationCode("http://localhost/?code=c&state=s2", "s1")).toThrow(
			"Authorization state mismatch; start the authorization again",
		);
		expect(() => extractAuthorizationCode("http://localhost/?code=c", "s1")).toThrow(AuthenticationError);
		expect(extractAuthorizationCode("bare-code", "s1")).toBe("bare-code");
	});

	it("reads code and error parameters from a URL", () => {
		expect(extractAuthorizationCode("http://localhost/?code=from-url")).toBe("from-url");
		expect(() => extractAuthorizationCode("http://localhost/?error=access_denied")).toThrow(
			"Authorization denied: access_denied",
		);
		expect(() => extractAuthorizationCode("http://localhost/?state=x")).toThrow(
			"No authorization code found in the redirect URL",
		);
		expect(() => extractAuthorizationCode("")).toThrow(AuthenticationError);
	});
});

describe("ScriptedConsentFlow", () => {
	it("records the consent URL and returns its code", async () => {
		const flow = new ScriptedConsentFlow("canned");

		await expect(flow.authorize(buildUrl)).resolves.toEqual({ code: "canned", redirectUri: "http://localhost" });
		expect(flow.requestedUrls).toEqual([
			"https://auth.example.test/consent?redirect_uri=http%3A%2F%2Flocalhost&state=scripted",
		]);
	});

	it("abandons when scripted without a code", async () => {
		await expect(new ScriptedConsentFlow(null).authorize(buildUrl)).rejects.toThrow(AuthenticationError);
	});
});
