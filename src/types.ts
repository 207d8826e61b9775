import type { Credentials } from "google-auth-library";
import type { calendar_v3 } from "googleapis";

/** OAuth client identity from the Google Cloud console's credentials.json. */
export interface ClientCredential {
	clientId: string;
	clientSecret: string;
}

/** Access/refresh token pair, stored as google-auth-library writes it. */
export type SessionToken = Credentials;

export type CalendarEvent = calendar_v3.Schema$Event;

/** Half-open [start, end) range used to filter events. */
export interface QueryWindow {
	start: Date;
	end: Date;
}

export interface CalendarDate {
	year: number;
	month: number;
	day: number;
}

export interface CalmPaths {
	configDir: string;
	credentialsFile: string;
	tokenFile: string;
}
