export class CalmError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** The OAuth client secret is missing or unreadable. The user has to fix it and retry. */
export class ConfigurationError extends CalmError {}

/** Consent was abandoned, denied or timed out, or the provider rejected the grant. */
export class AuthenticationError extends CalmError {}

/** Bad subcommand, option or date. */
export class UsageError extends CalmError {}

/** The Calendar API rejected a request. */
export class ApiError extends CalmError {}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
