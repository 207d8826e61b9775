import type { ConsentFlow } from "./calendar-oauth-flow.js";
import { CALENDAR_SCOPES } from "./config.js";
import type { CredentialStore } from "./credential-store.js";
import { AuthenticationError, CalmError, errorMessage } from "./errors.js";
import type { OAuthProvider } from "./google-oauth-provider.js";
import { debug } from "./log.js";
import type { ClientCredential, SessionToken } from "./types.js";

/** Tokens expiring within this margin are refreshed before use. */
const EXPIRY_MARGIN_MS = 60 * 1000;

export interface AuthenticatedSession {
	credential: ClientCredential;
	token: SessionToken;
}

export interface AuthenticatorOptions {
	store: CredentialStore;
	provider: OAuthProvider;
	flow: ConsentFlow;
	scopes?: string[];
	now?: () => Date;
}

export function isTokenFresh(token: SessionToken, now: Date): boolean {
	if (!token.access_token) return false;
	if (token.expiry_date === undefined || token.expiry_date === null) return true;
	return token.expiry_date - EXPIRY_MARGIN_MS > now.getTime();
}

/**
 * Obtains a usable session token: the stored one if still fresh, a silently refreshed
 * one, or a new one from the consent flow. Failed attempts never write the token file.
 */
export class Authenticator {
	private readonly store: CredentialStore;
	private readonly provider: OAuthProvider;
	private readonly flow: ConsentFlow;
	private readonly scopes: string[];
	private readonly now: () => Date;

	constructor(options: AuthenticatorOptions) {
		this.store = options.store;
		this.provider = options.provider;
		this.flow = options.flow;
		this.scopes = options.scopes ?? CALENDAR_SCOPES;
		this.now = options.now ?? (() => new Date());
	}

	async ensureAuthenticated(): Promise<AuthenticatedSession> {
		const credential = this.store.requireCredential();
		const token = this.store.loadToken();

		if (!token) {
			debug("No session token, starting consent");
			return this.consent(credential);
		}
		if (isTokenFresh(token, this.now())) {
			debug("Using stored session token");
			return { credential, token };
		}
		if (token.refresh_token) {
			try {
				const refreshed = await this.provider.refresh(credential, token);
				const merged: SessionToken = { ...refreshed, refresh_token: refreshed.refresh_token ?? token.refresh_token };
				this.store.saveToken(merged);
				debug("Refreshed session token");
				return { credential, token: merged };
			} catch (e) {
				debug(`Token refresh failed (${errorMessage(e)}), starting consent`);
			}
		}
		return this.consent(credential);
	}

	/** Always runs consent, replacing whatever token is stored. */
	async authorize(): Promise<AuthenticatedSession> {
		return this.consent(this.store.requireCredential());
	}

	private async consent(credential: ClientCredential): Promise<AuthenticatedSession> {
		let token: SessionToken;
		try {
			const grant = await this.flow.authorize((redirectUri, state) =>
				this.provider.authorizationUrl(credential, redirectUri, this.scopes, state),
			);
			token = await this.provider.exchangeCode(credential, grant);
		} catch (e) {
			if (e instanceof CalmError) throw e;
			throw new AuthenticationError(`Authorization failed: ${errorMessage(e)}`, { cause: e });
		}
		this.store.saveToken(token);
		return { credential, token };
	}
}
