// src/mobilelink/endpoint-fetcher.ts
import { TransportError } from './errors.js';
import type { SessionHttp } from './http-session.js';
import type { MobileLinkLogger } from './logger.js';
import type { SessionState } from './session-state.js';

export type EndpointResult =
	| { kind: 'data'; data: unknown }
	| { kind: 'noData' }
	| { kind: 'expired'; status: number };

/**
 * Issues authenticated GETs against the data API and classifies the result.
 *
 * 204 is "no data"; any other non-200 is treated as session expiry, since the
 * API uses it as its generic "not authenticated" answer. Network and JSON
 * failures throw TransportError and never count as expiry.
 */
export class EndpointFetcher {
	public constructor(
		private readonly apiBase: string,
		private readonly session: SessionState,
		private readonly http: SessionHttp,
		private readonly log: MobileLinkLogger,
	) {}

	public async fetch(path: string): Promise<EndpointResult> {
		const headers: Record<string, string> = {};
		if (this.session.csrfToken) {
			headers['X-Csrf-Token'] = this.session.csrfToken;
		}

		let status: number;
		let body: string;
		try {
			const { response } = await this.http.send(`${this.apiBase}${path}`, { headers });
			status = response.status;
			body = await response.text();
		} catch (err) {
			if (err instanceof TransportError) {
				throw err;
			}
			throw new TransportError(`Request to ${path} failed`, { cause: err });
		}

		if (status === 204) {
			this.log.debug('MobileLink: %s returned no data.', path);
			return { kind: 'noData' };
		}

		if (status !== 200) {
			this.log.debug('MobileLink: %s returned HTTP %d; treating session as expired.', path, status);
			return { kind: 'expired', status };
		}

		try {
			const data: unknown = JSON.parse(body);
			this.log.debug('MobileLink: %s -> %s', path, body);
			return { kind: 'data', data };
		} catch (err) {
			this.log.debug('MobileLink: %s returned non-JSON payload: %s', path, body);
			throw new TransportError(`${path} returned a non-JSON payload`, { cause: err });
		}
	}
}
