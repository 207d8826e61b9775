import { OAuth2Client } from "google-auth-library";
import type { AuthorizationGrant } from "./calendar-oauth-flow.js";
import type { ClientCredential, SessionToken } from "./types.js";

/** Token endpoint operations the authenticator needs from an OAuth2 provider. */
export interface OAuthProvider {
	authorizationUrl(credential: ClientCredential, redirectUri: string, scopes: string[], state: string): string;
	exchangeCode(credential: ClientCredential, grant: AuthorizationGrant): Promise<SessionToken>;
	refresh(credential: ClientCredential, token: SessionToken): Promise<SessionToken>;
}

export class GoogleOAuthProvider implements OAuthProvider {
	authorizationUrl(credential: ClientCredential, redirectUri: string, scopes: string[], state: string): string {
		const client = new OAuth2Client(credential.clientId, credential.clientSecret, redirectUri);
		// prompt=consent makes Google issue a refresh token on every authorization
		return client.generateAuthUrl({ access_type: "offline", scope: scopes, prompt: "consent", state });
	}

	async exchangeCode(credential: ClientCredential, grant: AuthorizationGrant): Promise<SessionToken> {
		const client = new OAuth2Client(credential.clientId, credential.clientSecret, grant.redirectUri);
		const { tokens } = await client.getToken(grant.code);
		return tokens;
	}

	async refresh(credential: ClientCredential, token: SessionToken): Promise<SessionToken> {
		if (!token.refresh_token) {
			throw new Error("Token has no refresh token");
		}
		const client = new OAuth2Client(credential.clientId, credential.clientSecret);
		client.setCredentials({ refresh_token: token.refresh_token });
		await client.getAccessToken();
		return { ...client.credentials, refresh_token: client.credentials.refresh_token ?? token.refresh_token };
	}
}
