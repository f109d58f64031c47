// src/mobilelink/http-session.ts
// Cookie-carrying HTTP helper shared by the login flow and the endpoint fetcher.
//
// Redirects are followed by hand so that every hop's Set-Cookie headers land
// in the session jar; fetch() drops them when it follows redirects itself.

import { TransportError } from './errors.js';
import type { SessionState } from './session-state.js';

// Minimal fetch signature so tests can inject a vi.fn() in place of the global.
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (input, init) => fetch(input, init);

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 10;

interface StoredCookie {
	name: string;
	value: string;
	domain: string;
	hostOnly: boolean;
}

function domainMatches(host: string, domain: string): boolean {
	return host === domain || host.endsWith(`.${domain}`);
}

/**
 * In-memory cookie store scoped by domain. Paths and secure flags are not
 * tracked; every cookie that domain-matches a request URL is sent.
 */
export class CookieJar {
	private readonly cookies = new Map<string, StoredCookie>();

	public get size(): number {
		return this.cookies.size;
	}

	public absorb(url: string, setCookieHeaders: readonly string[]): void {
		const host = new URL(url).hostname.toLowerCase();

		for (const header of setCookieHeaders) {
			const [pair, ...attributes] = header.split(';');
			const eq = pair.indexOf('=');
			if (eq <= 0) {
				continue;
			}

			const name = pair.slice(0, eq).trim();
			const value = pair.slice(eq + 1).trim();
			let domain = host;
			let hostOnly = true;
			let expired = false;

			for (const attribute of attributes) {
				const [rawKey, ...rest] = attribute.split('=');
				const key = rawKey.trim().toLowerCase();
				const attrValue = rest.join('=').trim();

				if (key === 'domain' && attrValue.length > 0) {
					domain = attrValue.replace(/^\./, '').toLowerCase();
					hostOnly = false;
				} else if (key === 'max-age') {
					const seconds = Number(attrValue);
					if (Number.isFinite(seconds) && seconds <= 0) {
						expired = true;
					}
				} else if (key === 'expires') {
					const at = Date.parse(attrValue);
					if (!Number.isNaN(at) && at <= Date.now()) {
						expired = true;
					}
				}
			}

			// A server may only set cookies for its own domain or a parent of it.
			if (!domainMatches(host, domain)) {
				continue;
			}

			const id = `${domain}|${name}`;
			if (expired) {
				this.cookies.delete(id);
			} else {
				this.cookies.set(id, { name, value, domain, hostOnly });
			}
		}
	}

	public headerFor(url: string): string {
		const host = new URL(url).hostname.toLowerCase();
		const parts: string[] = [];

		for (const cookie of this.cookies.values()) {
			const matches = cookie.hostOnly
				? host === cookie.domain
				: domainMatches(host, cookie.domain);
			if (matches) {
				parts.push(`${cookie.name}=${cookie.value}`);
			}
		}

		return parts.join('; ');
	}

	public clear(): void {
		this.cookies.clear();
	}
}

/** Merge two `Cookie` header values; names in `overlay` win. */
export function mergeCookieHeader(base: string | undefined, overlay: string): string {
	const merged = new Map<string, string>();

	for (const source of [base ?? '', overlay]) {
		for (const part of source.split(';')) {
			const eq = part.indexOf('=');
			if (eq <= 0) {
				continue;
			}
			merged.set(part.slice(0, eq).trim(), part.slice(eq + 1).trim());
		}
	}

	return Array.from(merged.entries())
		.map(([name, value]) => `${name}=${value}`)
		.join('; ');
}

export interface SessionRequestOptions {
	method?: 'GET' | 'POST';
	headers?: Record<string, string>;
	params?: Record<string, string>;
	form?: Record<string, string>;
}

export interface SessionResponse {
	response: Response;
	/** URL of the last hop, after redirects. */
	url: string;
}

export function withParams(url: string, params?: Record<string, string>): string {
	if (!params) {
		return url;
	}

	const target = new URL(url);
	for (const [key, value] of Object.entries(params)) {
		target.searchParams.set(key, value);
	}
	return target.toString();
}

export class SessionHttp {
	public constructor(
		private readonly session: SessionState,
		private readonly fetchFn: FetchLike = defaultFetch,
	) {}

	/**
	 * Send one request with the session's headers and cookies, following
	 * redirects. A 301/302/303 turns the follow-up into a GET without body.
	 */
	public async send(url: string, options: SessionRequestOptions = {}): Promise<SessionResponse> {
		let current = withParams(url, options.params);
		let method = options.method ?? 'GET';
		let form = options.form;

		for (let hop = 0; hop <= MAX_REDIRECTS; hop += 1) {
			const response = await this.sendOnce(current, method, options.headers, form);
			const location = response.headers.get('location');

			if (!REDIRECT_STATUSES.has(response.status) || !location) {
				return { response, url: current };
			}

			if (response.status !== 307 && response.status !== 308) {
				method = 'GET';
				form = undefined;
			}
			current = new URL(location, current).toString();
		}

		throw new TransportError(`Too many redirects while requesting ${url}`);
	}

	private async sendOnce(
		url: string,
		method: 'GET' | 'POST',
		extraHeaders: Record<string, string> | undefined,
		form: Record<string, string> | undefined,
	): Promise<Response> {
		const headers: Record<string, string> = { ...this.session.headers, ...extraHeaders };
		const cookie = mergeCookieHeader(headers.Cookie, this.session.cookies.headerFor(url));
		if (cookie.length > 0) {
			headers.Cookie = cookie;
		}

		const response = await this.fetchFn(url, {
			method,
			headers,
			body: form ? new URLSearchParams(form) : undefined,
			redirect: 'manual',
		});

		this.session.cookies.absorb(url, response.headers.getSetCookie());
		return response;
	}
}
