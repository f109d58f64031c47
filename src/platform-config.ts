// src/platform-config.ts
import type { PlatformConfig } from 'homebridge';

import type { MobileLinkCredential } from './mobilelink/session-state.js';
import { DEFAULT_POLL_INTERVAL_SECONDS, MIN_POLL_INTERVAL_SECONDS } from './settings.js';

export interface MobileLinkPlatformSettings {
	credential: MobileLinkCredential;
	pollIntervalMs: number;
	apiBase?: string;
	loginBase?: string;
}

export type ParsedPlatformConfig =
	| { ok: true; settings: MobileLinkPlatformSettings }
	| { ok: false; problem: string };

// config.schema.json uses camelCase; snake_case is accepted as well.
const AUTH_METHOD_ALIASES = new Map<string, MobileLinkCredential['kind']>([
	['usernamePassword', 'usernamePassword'],
	['username_password', 'usernamePassword'],
	['cookies', 'cookies'],
	['token', 'token'],
]);

function readString(raw: Record<string, unknown>, key: string): string {
	const value = raw[key];
	return typeof value === 'string' ? value.trim() : '';
}

function readBase(raw: Record<string, unknown>, key: string): string | undefined {
	const value = readString(raw, key).replace(/\/+$/, '');
	return value.length > 0 ? value : undefined;
}

/**
 * Turn the platform block from config.json into client settings.
 *
 * Canonical keys: authMethod, username (or email), password, cookies,
 * authToken, pollInterval (seconds), apiBase, loginBase.
 */
export function parsePlatformConfig(config: PlatformConfig): ParsedPlatformConfig {
	const raw: Record<string, unknown> = config;

	const methodName = readString(raw, 'authMethod') || 'usernamePassword';
	const method = AUTH_METHOD_ALIASES.get(methodName);
	if (!method) {
		return { ok: false, problem: `unknown authMethod "${methodName}"` };
	}

	const username = readString(raw, 'username') || readString(raw, 'email');
	// Passwords are taken verbatim; surrounding spaces may be significant.
	const password = typeof raw.password === 'string' ? raw.password : '';

	let credential: MobileLinkCredential;
	switch (method) {
	case 'token': {
		const token = readString(raw, 'authToken');
		if (!token) {
			return { ok: false, problem: 'authToken is required when authMethod is "token"' };
		}
		credential = { kind: 'token', token };
		break;
	}
	case 'cookies': {
		const cookies = readString(raw, 'cookies');
		if (!cookies) {
			return { ok: false, problem: 'cookies are required when authMethod is "cookies"' };
		}
		credential = username && password
			? { kind: 'cookies', cookies, fallback: { username, password } }
			: { kind: 'cookies', cookies };
		break;
	}
	case 'usernamePassword':
		if (!username || !password) {
			return { ok: false, problem: 'username and password are required' };
		}
		credential = { kind: 'usernamePassword', username, password };
		break;
	default: {
		const unreachable: never = method;
		return { ok: false, problem: `unsupported authMethod "${String(unreachable)}"` };
	}
	}

	const intervalRaw = raw.pollInterval;
	const intervalSeconds =
		typeof intervalRaw === 'number' && Number.isFinite(intervalRaw)
			? Math.max(MIN_POLL_INTERVAL_SECONDS, intervalRaw)
			: DEFAULT_POLL_INTERVAL_SECONDS;

	return {
		ok: true,
		settings: {
			credential,
			pollIntervalMs: intervalSeconds * 1000,
			apiBase: readBase(raw, 'apiBase'),
			loginBase: readBase(raw, 'loginBase'),
		},
	};
}
