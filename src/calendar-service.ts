import { OAuth2Client } from "google-auth-library";
import { type calendar_v3, google } from "googleapis";
import { ApiError, errorMessage } from "./errors.js";
import { debug } from "./log.js";
import type { CalendarEvent, ClientCredential, QueryWindow, SessionToken } from "./types.js";

const PAGE_SIZE = 250;

/** Source of events for a query window. */
export interface EventSource {
	listEvents(window: QueryWindow): Promise<CalendarEvent[]>;
}

/** The slice of calendar.events the service calls. */
export interface EventsApi {
	list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>;
}

export interface CalendarServiceOptions {
	calendarId: string;
	timeZone: string;
}

export interface CalendarClientOptions extends CalendarServiceOptions {
	/** Called when the client library refreshes the access token mid-request. */
	onTokens?: (token: SessionToken) => void;
}

export class CalendarService implements EventSource {
	constructor(
		private readonly events: EventsApi,
		private readonly options: CalendarServiceOptions,
	) {}

	static fromSession(credential: ClientCredential, token: SessionToken, options: CalendarClientOptions): CalendarService {
		const oauth2Client = new OAuth2Client(credential.clientId, credential.clientSecret, "http://localhost");
		oauth2Client.setCredentials(token);
		const { onTokens } = options;
		if (onTokens) {
			oauth2Client.on("tokens", (tokens) => {
				onTokens({ ...token, ...tokens, refresh_token: tokens.refresh_token ?? token.refresh_token });
			});
		}

		const calendar = google.calendar({ version: "v3", auth: oauth2Client });
		return new CalendarService({ list: (params) => calendar.events.list(params) }, options);
	}

	/** Expands recurring events and follows pagination until the window is exhausted. */
	async listEvents(window: QueryWindow): Promise<CalendarEvent[]> {
		const events: CalendarEvent[] = [];
		let pageToken: string | undefined;

		do {
			let response: { data: calendar_v3.Schema$Events };
			try {
				response = await this.events.list({
					calendarId: this.options.calendarId,
					timeMin: window.start.toISOString(),
					timeMax: window.end.toISOString(),
					timeZone: this.options.timeZone,
					maxResults: PAGE_SIZE,
					pageToken,
					singleEvents: true,
					orderBy: "startTime",
				});
			} catch (e) {
				throw new ApiError(`Calendar API request failed: ${errorMessage(e)}`, { cause: e });
			}

			events.push(...(response.data.items || []));
			pageToken = response.data.nextPageToken || undefined;
			debug(`Fetched ${events.length} events${pageToken ? ", more pages pending" : ""}`);
		} while (pageToken);

		return events;
	}
}
