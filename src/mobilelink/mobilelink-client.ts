// src/mobilelink/mobilelink-client.ts
import { EndpointFetcher } from './endpoint-fetcher.js';
import {
	InvalidCredentialsError,
	SessionExpiredError,
	TransportError,
} from './errors.js';
import { defaultFetch, SessionHttp, type FetchLike } from './http-session.js';
import { LoginFlow } from './login-flow.js';
import { createConsoleLogger, type MobileLinkLogger } from './logger.js';
import {
	createSessionState,
	type AuthMode,
	type MobileLinkCredential,
	type SessionState,
} from './session-state.js';
import {
	decodeApparatus,
	decodeApparatusDetail,
	GENERATOR_APPARATUS_TYPE,
	type Apparatus,
	type ApparatusDetail,
	type Item,
} from './types.js';

export const DEFAULT_API_BASE = 'https://app.mobilelinkgen.com/api';
export const DEFAULT_LOGIN_BASE =
	'https://generacconnectivity.b2clogin.com/generacconnectivity.onmicrosoft.com/B2C_1A_MobileLink_SignIn';

// Newest generation first; fallback only ever moves down this list.
const APPARATUS_LIST_PATHS = ['/v5/Apparatus/list', '/v2/Apparatus/list'] as const;

const apparatusDetailPaths = (apparatusId: number): readonly string[] => [
	`/v5/Apparatus/${apparatusId}`,
	`/v1/Apparatus/details/${apparatusId}`,
];

/** Extra full passes (login + fetch) allowed after a session expiry. */
export const MAX_EXPIRY_RETRIES = 1;

export interface MobileLinkClientOptions {
	apiBase?: string;
	loginBase?: string;
	fetch?: FetchLike;
	logger?: MobileLinkLogger;
}

export interface SessionSnapshot {
	authMode: AuthMode;
	headers: Record<string, string>;
	csrfToken?: string;
	loggedIn: boolean;
}

/**
 * MobileLink cloud client: authenticates with one of three credential kinds
 * and returns the generator units on the account with their detail records.
 *
 * One fetchDeviceData() call at a time per instance; callers serialize.
 */
export class MobileLinkClient {
	private readonly log: MobileLinkLogger;
	private readonly session: SessionState;
	private readonly fetcher: EndpointFetcher;
	private readonly loginFlow: LoginFlow;

	public constructor(
		private readonly credential: MobileLinkCredential,
		options: MobileLinkClientOptions = {},
	) {
		this.log = options.logger ?? createConsoleLogger('mobilelink-client');
		this.session = createSessionState(credential);

		const apiBase = options.apiBase ?? DEFAULT_API_BASE;
		const loginBase = options.loginBase ?? DEFAULT_LOGIN_BASE;
		const http = new SessionHttp(this.session, options.fetch ?? defaultFetch);

		this.fetcher = new EndpointFetcher(apiBase, this.session, http, this.log);
		this.loginFlow = new LoginFlow({ apiBase, loginBase }, this.session, http, this.log);

		this.log.debug('MobileLinkClient: constructed with authMode=%s', credential.kind);
	}

	public getSessionSnapshot(): SessionSnapshot {
		return {
			authMode: this.session.authMode,
			headers: { ...this.session.headers },
			csrfToken: this.session.csrfToken,
			loggedIn: this.session.loggedIn,
		};
	}

	/**
	 * Establish a session for the configured credential:
	 * - token: nothing to do, tokens are pre-authenticated.
	 * - cookies: probe the device list; fall back to username/password when
	 *   the probe does not return data and a fallback is configured.
	 * - usernamePassword: always run the full sign-in flow.
	 */
	public async login(): Promise<void> {
		const credential = this.credential;

		switch (credential.kind) {
		case 'token':
			return;
		case 'cookies': {
			const probe = await this.fetcher.fetch(APPARATUS_LIST_PATHS[0]);
			if (probe.kind === 'data') {
				this.log.debug('MobileLinkClient: stored cookies are still valid.');
				return;
			}

			if (!credential.fallback) {
				throw new InvalidCredentialsError(
					'Cookies are no longer accepted and no username/password is configured',
				);
			}

			this.log.warn('MobileLinkClient: cookies rejected (%s); signing in with username/password.', probe.kind);
			await this.signIn(credential.fallback.username, credential.fallback.password);
			return;
		}
		case 'usernamePassword':
			await this.signIn(credential.username, credential.password);
			return;
		default: {
			const unreachable: never = credential;
			throw new Error(`Unsupported credential: ${String(unreachable)}`);
		}
		}
	}

	/**
	 * Fetch every generator on the account, keyed by apparatus id.
	 * Returns null when the device list has no data. A session expiry causes
	 * one fresh login and a full retry; a second expiry is rethrown.
	 */
	public async fetchDeviceData(): Promise<Map<string, Item> | null> {
		for (let attempt = 0; ; attempt += 1) {
			try {
				if (!this.session.loggedIn) {
					await this.login();
					this.session.loggedIn = true;
				}

				return await this.retrieveGenerators();
			} catch (err) {
				if (!(err instanceof SessionExpiredError)) {
					throw err;
				}

				this.session.loggedIn = false;

				if (attempt >= MAX_EXPIRY_RETRIES) {
					this.log.error('MobileLinkClient: session expired again after logging in; giving up.');
					throw new SessionExpiredError(
						'Session expired again after re-login',
						err.status,
						{ cause: err },
					);
				}

				this.log.warn('MobileLinkClient: %s; logging in again and retrying once.', err.message);
			}
		}
	}

	private async signIn(username: string, password: string): Promise<void> {
		if (!username.trim() || !password) {
			throw new InvalidCredentialsError('Username and password required for login');
		}

		await this.loginFlow.run(username, password);
	}

	private async retrieveGenerators(): Promise<Map<string, Item> | null> {
		const list = await this.fetchWithFallback(APPARATUS_LIST_PATHS);
		if (!list) {
			this.log.debug('MobileLinkClient: apparatus list returned no data.');
			return null;
		}

		if (!Array.isArray(list.data)) {
			throw new TransportError(
				`Expected a list from the apparatus list endpoint, got ${typeof list.data}`,
			);
		}

		const items = new Map<string, Item>();

		for (const entry of list.data) {
			const apparatus = decodeApparatus(entry);
			if (!apparatus) {
				this.log.warn('MobileLinkClient: skipping apparatus entry without apparatusId/type.');
				continue;
			}

			if (apparatus.type !== GENERATOR_APPARATUS_TYPE) {
				this.log.debug(
					'MobileLinkClient: unknown apparatus type %d %s',
					apparatus.type,
					apparatus.name ?? '',
				);
				continue;
			}

			const detail = await this.fetchDetail(apparatus);
			if (!detail) {
				continue;
			}

			items.set(String(apparatus.apparatusId), { apparatus, apparatusDetail: detail });
		}

		this.log.debug('MobileLinkClient: fetched %d generator(s).', items.size);
		return items;
	}

	private async fetchDetail(apparatus: Apparatus): Promise<ApparatusDetail | undefined> {
		let found: { data: unknown } | undefined;
		try {
			found = await this.fetchWithFallback(apparatusDetailPaths(apparatus.apparatusId));
		} catch (err) {
			if (!(err instanceof TransportError)) {
				throw err;
			}
			this.log.warn(
				'MobileLinkClient: detail fetch failed for apparatus %d: %s',
				apparatus.apparatusId,
				err.message,
			);
			return undefined;
		}

		if (!found) {
			this.log.debug('MobileLinkClient: no detail record for apparatus %d.', apparatus.apparatusId);
			return undefined;
		}

		const detail = decodeApparatusDetail(found.data);
		if (!detail) {
			this.log.warn('MobileLinkClient: malformed detail record for apparatus %d.', apparatus.apparatusId);
		}
		return detail;
	}

	/**
	 * Walk the paths in order, moving to the next one only on "no data".
	 * Expiry on any of them is raised as SessionExpiredError.
	 */
	private async fetchWithFallback(paths: readonly string[]): Promise<{ data: unknown } | undefined> {
		for (const path of paths) {
			const result = await this.fetcher.fetch(path);

			switch (result.kind) {
			case 'data':
				return { data: result.data };
			case 'expired':
				throw new SessionExpiredError(`API returned status code ${result.status} for ${path}`, result.status);
			case 'noData':
				break;
			}
		}

		return undefined;
	}
}
