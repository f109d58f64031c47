// src/mobilelink/session-state.ts
import { CookieJar } from './http-session.js';

export interface UsernamePasswordCredential {
	kind: 'usernamePassword';
	username: string;
	password: string;
}

export interface CookieCredential {
	kind: 'cookies';
	/** Raw `Cookie` header copied from a browser session. */
	cookies: string;
	/** Used when the cookies turn out to be expired. */
	fallback?: {
		username: string;
		password: string;
	};
}

export interface TokenCredential {
	kind: 'token';
	token: string;
}

export type MobileLinkCredential =
	| UsernamePasswordCredential
	| CookieCredential
	| TokenCredential;

export type AuthMode = MobileLinkCredential['kind'];

export interface SessionState {
	readonly authMode: AuthMode;
	readonly headers: Readonly<Record<string, string>>;
	csrfToken?: string;
	loggedIn: boolean;
	readonly cookies: CookieJar;
}

const MOBILE_APP_USER_AGENT = 'mobilelink/75633 CFNetwork/3826.600.41 Darwin/24.6.0';
const BROWSER_USER_AGENT =
	'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

/** Request headers for a credential kind, before any CSRF token is known. */
export function buildAuthHeaders(credential: MobileLinkCredential): Record<string, string> {
	switch (credential.kind) {
	case 'token':
		return {
			'Accept': 'application/json',
			'Authorization': `Bearer ${credential.token}`,
			'User-Agent': MOBILE_APP_USER_AGENT,
			'Accept-Language': 'en-US,en;q=0.9',
		};
	case 'cookies':
		return {
			'User-Agent': BROWSER_USER_AGENT,
			'Accept': 'application/json, text/plain, */*',
			'Accept-Language': 'en-US,en;q=0.9',
			'Cookie': credential.cookies,
		};
	case 'usernamePassword':
		return {
			'User-Agent': BROWSER_USER_AGENT,
			'Accept': 'application/json, text/plain, */*',
			'Accept-Language': 'en-US,en;q=0.9',
		};
	default: {
		const unreachable: never = credential;
		throw new Error(`Unsupported credential: ${String(unreachable)}`);
	}
	}
}

export function createSessionState(credential: MobileLinkCredential): SessionState {
	return {
		authMode: credential.kind,
		headers: buildAuthHeaders(credential),
		csrfToken: undefined,
		// Bearer tokens are pre-authenticated and never probed.
		loggedIn: credential.kind === 'token',
		cookies: new CookieJar(),
	};
}
