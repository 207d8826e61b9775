import { spawn } from "child_process";
import { randomBytes } from "crypto";
import * as http from "http";
import * as readline from "readline/promises";
import { AuthenticationError, errorMessage } from "./errors.js";
import { debug } from "./log.js";

const TIMEOUT_MS = 2 * 60 * 1000;
const MANUAL_REDIRECT_URI = "http://localhost";
const SCRIPTED_STATE = "scripted";

/** Opaque value tying a redirect to the consent request that produced it. */
function createState(): string {
	return randomBytes(16).toString("hex");
}

export interface AuthorizationGrant {
	code: string;
	redirectUri: string;
}

/** Builds the provider's consent URL for a redirect URI and state chosen by the flow. */
export type ConsentUrlBuilder = (redirectUri: string, state: string) => string;

/**
 * Obtains an authorization code from the user. Implementations decide where the
 * provider redirects to and how the code comes back.
 */
export interface ConsentFlow {
	authorize(buildUrl: ConsentUrlBuilder): Promise<AuthorizationGrant>;
}

export interface InteractiveConsentFlowOptions {
	timeoutMs?: number;
	openBrowser?: (url: string) => void;
	print?: (line: string) => void;
}

export function openBrowser(url: string): void {
	const [command, args]: [string, string[]] =
		process.platform === "darwin"
			? ["open", [url]]
			: process.platform === "win32"
				? ["cmd", ["/c", "start", "", url]]
				: ["xdg-open", [url]];
	const child = spawn(command, args, { stdio: "ignore", detached: true });
	child.on("error", (e) => debug(`Could not open browser: ${e.message}`));
	child.unref();
}

/**
 * Browser consent: listens on a loopback port, opens the consent page and waits for the
 * provider to redirect back with ?code= (or ?error=). Requests whose state does not match
 * are answered 400 and ignored.
 */
export class InteractiveConsentFlow implements ConsentFlow {
	private readonly timeoutMs: number;
	private readonly open: (url: string) => void;
	private readonly print: (line: string) => void;

	constructor(options: InteractiveConsentFlowOptions = {}) {
		this.timeoutMs = options.timeoutMs ?? TIMEOUT_MS;
		this.open = options.openBrowser ?? openBrowser;
		this.print = options.print ?? ((line) => console.log(line));
	}

	authorize(buildUrl: ConsentUrlBuilder): Promise<AuthorizationGrant> {
		return new Promise((resolve, reject) => {
			const state = createState();
			let redirectUri = "";
			let timer: NodeJS.Timeout | undefined;

			const finish = (outcome: { grant: AuthorizationGrant } | { error: Error }) => {
				clearTimeout(timer);
				server.close();
				server.closeIdleConnections();
				if ("grant" in outcome) resolve(outcome.grant);
				else reject(outcome.error);
			};

			const server = http.createServer((req, res) => {
				const url = new URL(req.url ?? "/", redirectUri);
				const code = url.searchParams.get("code");
				const error = url.searchParams.get("error");

				if ((code || error) && url.searchParams.get("state") !== state) {
					debug("Ignoring OAuth redirect with a mismatched state");
					res.writeHead(400, { "Content-Type": "text/html", Connection: "close" });
					res.end("<h1>Authorization failed</h1><p>State mismatch.</p>");
				} else if (error) {
					res.writeHead(400, { "Content-Type": "text/html", Connection: "close" });
					res.end("<h1>Authorization failed</h1><p>You can close this window.</p>");
					finish({ error: new AuthenticationError(`Authorization denied: ${error}`) });
				} else if (code) {
					res.writeHead(200, { "Content-Type": "text/html", Connection: "close" });
					res.end("<h1>Authorization successful</h1><p>You can close this window.</p>");
					finish({ grant: { code, redirectUri } });
				} else {
					res.writeHead(404, { Connection: "close" });
					res.end();
				}
			});

			server.on("error", (e) => finish({ error: new AuthenticationError(`Callback listener failed: ${e.message}`, { cause: e }) }));

			server.listen(0, "127.0.0.1", () => {
				const address = server.address();
				const port = typeof address === "object" && address !== null ? address.port : 0;
				redirectUri = `http://127.0.0.1:${port}`;
				const authUrl = buildUrl(redirectUri, state);
				debug(`Waiting for OAuth redirect on ${redirectUri}`);
				this.print("Opening browser for Google Calendar authorization...");
				this.print("If the browser doesn't open, visit this URL:");
				this.print(authUrl);
				this.open(authUrl);
			});

			timer = setTimeout(() => {
				finish({ error: new AuthenticationError(`Authorization timed out after ${Math.round(this.timeoutMs / 1000)} seconds`) });
			}, this.timeoutMs);
		});
	}
}

export interface ManualConsentFlowOptions {
	input?: NodeJS.ReadableStream;
	output?: NodeJS.WritableStream;
}

/**
 * Extracts the code from a pasted redirect URL, or accepts a bare code. A URL must carry
 * expectedState when one is given.
 */
export function extractAuthorizationCode(pasted: string, expectedState?: string): string {
	const trimmed = pasted.trim();
	if (!trimmed) throw new AuthenticationError("No authorization code provided");
	if (!/^https?:\/\//.test(trimmed)) return trimmed;

	let url: URL;
	try {
		url = new URL(trimmed);
	} catch (e) {
		throw new AuthenticationError(`Cannot parse redirect URL: ${errorMessage(e)}`, { cause: e });
	}
	if (expectedState !== undefined && url.searchParams.get("state") !== expectedState) {
		throw new AuthenticationError("Authorization state mismatch; start the authorization again");
	}
	const error = url.searchParams.get("error");
	if (error) throw new AuthenticationError(`Authorization denied: ${error}`);
	const code = url.searchParams.get("code");
	if (!code) throw new AuthenticationError("No authorization code found in the redirect URL");
	return code;
}

/**
 * Browserless consent for headless machines: the user opens the URL elsewhere and pastes
 * the (failing) localhost redirect URL back.
 */
export class ManualConsentFlow implements ConsentFlow {
	private readonly input: NodeJS.ReadableStream;
	private readonly output: NodeJS.WritableStream;

	constructor(options: ManualConsentFlowOptions = {}) {
		this.input = options.input ?? process.stdin;
		this.output = options.output ?? process.stdout;
	}

	async authorize(buildUrl: ConsentUrlBuilder): Promise<AuthorizationGrant> {
		const state = createState();
		const authUrl = buildUrl(MANUAL_REDIRECT_URI, state);
		this.output.write("Visit this URL to authorize Google Calendar access:\n");
		this.output.write(`${authUrl}\n\n`);
		this.output.write("After approving, your browser will fail to load a localhost page. Copy its full URL.\n");

		const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });
		try {
			const answer = await rl.question("Paste redirect URL: ");
			return { code: extractAuthorizationCode(answer, state), redirectUri: MANUAL_REDIRECT_URI };
		} finally {
			rl.close();
		}
	}
}

/** Replays a canned outcome: a code, or abandonment when code is null. */
export class ScriptedConsentFlow implements ConsentFlow {
	readonly requestedUrls: string[] = [];

	constructor(
		private readonly code: string | null,
		private readonly redirectUri = MANUAL_REDIRECT_URI,
	) {}

	async authorize(buildUrl: ConsentUrlBuilder): Promise<AuthorizationGrant> {
		this.requestedUrls.push(buildUrl(this.redirectUri, SCRIPTED_STATE));
		if (this.code === null) {
			throw new AuthenticationError("Authorization was abandoned");
		}
		return { code: this.code, redirectUri: this.redirectUri };
	}
}
