// tests/fixtures/http.ts
import { vi } from 'vitest';

export const API_BASE = 'https://api.test/api';
export const LOGIN_BASE = 'https://login.test/tenant/B2C_1A_Test_SignIn';

export function jsonResponse(payload: unknown, init: ResponseInit = {}): Response {
	const headers = new Headers(init.headers);
	if (!headers.has('Content-Type')) {
		headers.set('Content-Type', 'application/json');
	}

	return new Response(JSON.stringify(payload), {
		...init,
		headers,
	});
}

export function htmlResponse(html: string, init: ResponseInit = {}): Response {
	const headers = new Headers(init.headers);
	if (!headers.has('Content-Type')) {
		headers.set('Content-Type', 'text/html; charset=utf-8');
	}

	return new Response(html, {
		...init,
		headers,
	});
}

export function statusResponse(status: number, init: ResponseInit = {}): Response {
	return new Response(null, { ...init, status });
}

export function redirectResponse(location: string, setCookie?: string): Response {
	const headers = new Headers({ Location: location });
	if (setCookie) {
		headers.append('Set-Cookie', setCookie);
	}
	return new Response(null, { status: 302, headers });
}

export interface RecordedCall {
	method: string;
	url: string;
	headers: Headers;
	body?: string;
}

/**
 * Routes are keyed by "METHOD origin+pathname" (query ignored); each route
 * holds a queue of response factories consumed in order.
 */
export function createFakeFetch(routes: Record<string, Array<() => Response>>) {
	const calls: RecordedCall[] = [];

	const fetchFn = vi.fn(async (input: string, init?: RequestInit): Promise<Response> => {
		const url = new URL(input);
		const method = init?.method ?? 'GET';
		const key = `${method} ${url.origin}${url.pathname}`;

		calls.push({
			method,
			url: input,
			headers: new Headers(init?.headers),
			body: init?.body instanceof URLSearchParams ? init.body.toString() : undefined,
		});

		const next = routes[key]?.shift();
		if (!next) {
			throw new Error(`Unexpected request: ${key}`);
		}
		return next();
	});

	const requested = (): string[] =>
		calls.map((call) => `${call.method} ${new URL(call.url).pathname}`);

	return { fetchFn, calls, requested };
}

export const mockLogger = {
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
};

export function signInPage(settings: Record<string, unknown> | null): string {
	const settingsLine = settings === null
		? '// no settings on this page'
		: `var SETTINGS = ${JSON.stringify(settings)};`;

	return [
		'<!DOCTYPE html>',
		'<html>',
		'<head>',
		'<script type="text/javascript">',
		'  var CONTENT = {"button_signin":"Sign in"};',
		`  ${settingsLine}`,
		'</script>',
		'</head>',
		'<body><form id="localAccountForm"><input type="email" id="signInName"/></form></body>',
		'</html>',
	].join('\n');
}

export function finalFormPage(action: string, state = 'state-1', code = 'code-1'): string {
	return [
		'<html><body onload="document.forms[0].submit()">',
		`<form method="POST" action="${action}">`,
		`<input type="hidden" name="state" value="${state}"/>`,
		`<input type="hidden" name="code" value="${code}"/>`,
		'</form>',
		'</body></html>',
	].join('\n');
}
