import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConfigurationError, errorMessage } from "./errors.js";
import { debug } from "./log.js";
import type { CalmPaths, ClientCredential, SessionToken } from "./types.js";

const CONFIGURE_HINT = "Run: calm configure oauth --path <credentials.json>";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): boolean {
	return value === undefined || value === null || typeof value === "string";
}

/**
 * Reads the client id and secret out of a client-secret document. Accepts Google's
 * download format ({ installed: {...} } or { web: {...} }) and the flat
 * { clientId, clientSecret } shape.
 */
export function parseClientCredential(data: unknown): ClientCredential | null {
	if (!isRecord(data)) return null;
	const nested = isRecord(data.installed) ? data.installed : isRecord(data.web) ? data.web : undefined;
	const clientId = nested ? nested.client_id : data.clientId;
	const clientSecret = nested ? nested.client_secret : data.clientSecret;
	if (typeof clientId !== "string" || typeof clientSecret !== "string" || !clientId || !clientSecret) {
		return null;
	}
	return { clientId, clientSecret };
}

export function isSessionToken(data: unknown): data is SessionToken {
	if (!isRecord(data)) return false;
	const { access_token, refresh_token, expiry_date } = data;
	if (typeof access_token !== "string" && typeof refresh_token !== "string") return false;
	if (!optionalString(access_token) || !optionalString(refresh_token)) return false;
	return expiry_date === undefined || expiry_date === null || typeof expiry_date === "number";
}

/**
 * Client secret and session token files under one config directory. Nothing is cached:
 * every call goes to disk, so the token a caller holds is exactly what it read or wrote.
 */
export class CredentialStore {
	constructor(readonly paths: CalmPaths) {}

	private ensureConfigDir(): void {
		if (!fs.existsSync(this.paths.configDir)) {
			fs.mkdirSync(this.paths.configDir, { recursive: true, mode: 0o700 });
		}
	}

	private writePrivate(file: string, contents: string): void {
		this.ensureConfigDir();
		fs.writeFileSync(file, contents, { mode: 0o600 });
		// writeFileSync only applies mode when it creates the file
		fs.chmodSync(file, 0o600);
	}

	loadCredential(): ClientCredential | null {
		if (!fs.existsSync(this.paths.credentialsFile)) return null;
		let data: unknown;
		try {
			data = JSON.parse(fs.readFileSync(this.paths.credentialsFile, "utf8"));
		} catch (e) {
			throw new ConfigurationError(
				`Cannot read ${this.paths.credentialsFile}: ${errorMessage(e)}. ${CONFIGURE_HINT}`,
				{ cause: e },
			);
		}
		const credential = parseClientCredential(data);
		if (!credential) {
			throw new ConfigurationError(`Invalid OAuth client in ${this.paths.credentialsFile}. ${CONFIGURE_HINT}`);
		}
		return credential;
	}

	requireCredential(): ClientCredential {
		const credential = this.loadCredential();
		if (!credential) {
			throw new ConfigurationError(
				`Missing OAuth client at ${this.paths.credentialsFile}. Download a Desktop OAuth client from the Google Cloud console, then ${CONFIGURE_HINT}`,
			);
		}
		return credential;
	}

	/** Validates a client-secret document and stores it as given. */
	importCredential(raw: string): ClientCredential {
		let data: unknown;
		try {
			data = JSON.parse(raw);
		} catch (e) {
			throw new ConfigurationError(`OAuth client is not valid JSON: ${errorMessage(e)}`, { cause: e });
		}
		const credential = parseClientCredential(data);
		if (!credential) {
			throw new ConfigurationError("Invalid OAuth client JSON (need 'installed' or 'web' with client_id and client_secret)");
		}
		this.writePrivate(this.paths.credentialsFile, JSON.stringify(data, null, 2));
		return credential;
	}

	importCredentialFile(file: string): ClientCredential {
		const resolved = path.resolve(file.startsWith("~") ? path.join(os.homedir(), file.slice(1)) : file);
		if (!fs.existsSync(resolved)) {
			throw new ConfigurationError(`credentials.json not found: ${resolved}`);
		}
		return this.importCredential(fs.readFileSync(resolved, "utf8"));
	}

	/** Returns null for a missing or corrupt token file. */
	loadToken(): SessionToken | null {
		if (!fs.existsSync(this.paths.tokenFile)) return null;
		try {
			const data: unknown = JSON.parse(fs.readFileSync(this.paths.tokenFile, "utf8"));
			if (isSessionToken(data)) return data;
			debug(`Ignoring ${this.paths.tokenFile}: not a session token`);
		} catch (e) {
			debug(`Ignoring ${this.paths.tokenFile}: ${errorMessage(e)}`);
		}
		return null;
	}

	saveToken(token: SessionToken): void {
		this.writePrivate(this.paths.tokenFile, JSON.stringify(token, null, 2));
	}

	deleteToken(): boolean {
		return this.deleteFile(this.paths.tokenFile);
	}

	deleteCredential(): boolean {
		return this.deleteFile(this.paths.credentialsFile);
	}

	private deleteFile(file: string): boolean {
		if (!fs.existsSync(file)) return false;
		fs.unlinkSync(file);
		return true;
	}
}
