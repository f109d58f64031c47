import type { PlatformConfig } from 'homebridge';
import { describe, expect, it } from 'vitest';

import { parsePlatformConfig } from '../src/platform-config.js';

const config = (fields: Record<string, unknown>): PlatformConfig => ({
	platform: 'MobileLinkGenerator',
	...fields,
});

describe('parsePlatformConfig', () => {
	it('defaults to username/password with a 30 second poll', () => {
		expect(parsePlatformConfig(config({ username: ' user@example.com ', password: 'test-password' }))).toEqual({
			ok: true,
			settings: {
				credential: { kind: 'usernamePassword', username: 'user@example.com', password: 'test-password' },
				pollIntervalMs: 30_000,
				apiBase: undefined,
				loginBase: undefined,
			},
		});
	});

	it('accepts email in place of username and snake_case method names', () => {
		const parsed = parsePlatformConfig(config({
			authMethod: 'username_password',
			email: 'user@example.com',
			password: 'test-password',
		}));

		expect(parsed).toMatchObject({
			ok: true,
			settings: { credential: { kind: 'usernamePassword', username: 'user@example.com' } },
		});
	});

	it('builds a token credential', () => {
		expect(parsePlatformConfig(config({ authMethod: 'token', authToken: 'test-token' }))).toMatchObject({
			ok: true,
			settings: { credential: { kind: 'token', token: 'test-token' } },
		});
	});

	it('attaches a username/password fallback to cookies only when both are set', () => {
		expect(parsePlatformConfig(config({
			authMethod: 'cookies',
			cookies: 'session=abc',
			username: 'user@example.com',
			password: 'test-password',
		}))).toMatchObject({
			ok: true,
			settings: {
				credential: {
					kind: 'cookies',
					cookies: 'session=abc',
					fallback: { username: 'user@example.com', password: 'test-password' },
				},
			},
		});

		const withoutPassword = parsePlatformConfig(config({
			authMethod: 'cookies',
			cookies: 'session=abc',
			username: 'user@example.com',
		}));
		expect(withoutPassword.ok && withoutPassword.settings.credential).toEqual({
			kind: 'cookies',
			cookies: 'session=abc',
		});
	});

	it.each([
		[{ authMethod: 'oauth' }, 'unknown authMethod "oauth"'],
		[{ authMethod: 'toString' }, 'unknown authMethod "toString"'],
		[{ authMethod: 'token' }, 'authToken is required when authMethod is "token"'],
		[{ authMethod: 'cookies', cookies: '  ' }, 'cookies are required when authMethod is "cookies"'],
		[{ username: 'user@example.com' }, 'username and password are required'],
	])('reports %o as a problem', (fields, problem) => {
		expect(parsePlatformConfig(config(fields))).toEqual({ ok: false, problem });
	});

	it('clamps the poll interval and trims trailing slashes from base URLs', () => {
		const parsed = parsePlatformConfig(config({
			authMethod: 'token',
			authToken: 'test-token',
			pollInterval: 3,
			apiBase: 'https://api.test/api/',
			loginBase: 'https://login.test/tenant//',
		}));

		expect(parsed).toMatchObject({
			ok: true,
			settings: {
				pollIntervalMs: 10_000,
				apiBase: 'https://api.test/api',
				loginBase: 'https://login.test/tenant',
			},
		});
	});

	it('keeps longer poll intervals as configured', () => {
		const parsed = parsePlatformConfig(config({ authMethod: 'token', authToken: 'test-token', pollInterval: 120 }));

		expect(parsed.ok && parsed.settings.pollIntervalMs).toBe(120_000);
	});
});
