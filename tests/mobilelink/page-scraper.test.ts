import { describe, expect, it } from 'vitest';

import { extractFinalForm, extractSettingsJson } from '../../src/mobilelink/page-scraper.js';
import { finalFormPage, signInPage } from '../fixtures/http.js';

describe('extractSettingsJson', () => {
	it('parses the SETTINGS assignment out of the page script', () => {
		const page = signInPage({ csrf: 'csrf-abc', transId: 'tx-123', hosts: { tenant: '/tenant' } });

		expect(extractSettingsJson(page)).toEqual({
			csrf: 'csrf-abc',
			transId: 'tx-123',
			hosts: { tenant: '/tenant' },
		});
	});

	it('returns undefined when the assignment is absent', () => {
		expect(extractSettingsJson(signInPage(null))).toBeUndefined();
	});

	it('returns undefined when the payload is not JSON', () => {
		const page = '<script>\nvar SETTINGS = {csrf: broken};\n</script>';

		expect(extractSettingsJson(page)).toBeUndefined();
	});

	it('requires the trailing semicolon', () => {
		const page = '<script>\nvar SETTINGS = {"csrf":"x"}\n</script>';

		expect(extractSettingsJson(page)).toBeUndefined();
	});
});

describe('extractFinalForm', () => {
	it('reads the action and hidden state/code values', () => {
		const page = finalFormPage('https://api.test/signin-oidc', 'state-9', 'code-9');

		expect(extractFinalForm(page)).toEqual({
			action: 'https://api.test/signin-oidc',
			state: 'state-9',
			code: 'code-9',
		});
	});

	it('returns undefined when the code input is missing', () => {
		const page = [
			'<form action="https://api.test/signin-oidc">',
			'<input type="hidden" name="state" value="state-1"/>',
			'</form>',
		].join('\n');

		expect(extractFinalForm(page)).toBeUndefined();
	});

	it('returns undefined when the form has no action', () => {
		const page = [
			'<form>',
			'<input type="hidden" name="state" value="state-1"/>',
			'<input type="hidden" name="code" value="code-1"/>',
			'</form>',
		].join('\n');

		expect(extractFinalForm(page)).toBeUndefined();
	});

	it('returns undefined for the sign-in page', () => {
		expect(extractFinalForm(signInPage({ csrf: 'c', transId: 't' }))).toBeUndefined();
	});
});
