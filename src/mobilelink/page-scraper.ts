// src/mobilelink/page-scraper.ts
// Pattern matching against the identity provider's HTML pages. Kept apart from
// the login flow so the brittle part can be swapped or tested on its own.

import { parse } from 'node-html-parser';

const SETTINGS_PREFIX = 'var SETTINGS = ';

export interface FinalForm {
	action: string;
	state: string;
	code: string;
}

/**
 * Find the `var SETTINGS = {...};` line in the sign-in page and parse its
 * JSON payload. Returns undefined when the line is absent or not valid JSON.
 */
export function extractSettingsJson(page: string): unknown {
	for (const rawLine of page.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (!line.startsWith(SETTINGS_PREFIX) || !line.endsWith(';')) {
			continue;
		}

		try {
			return JSON.parse(line.slice(SETTINGS_PREFIX.length, -1));
		} catch {
			return undefined;
		}
	}

	return undefined;
}

/**
 * Locate the auto-submit form that completes the login: the first form's
 * action plus the `state` and `code` hidden inputs.
 */
export function extractFinalForm(page: string): FinalForm | undefined {
	const root = parse(page);

	const action = root.querySelector('form')?.getAttribute('action');
	const state = root.querySelector('input[name=state]')?.getAttribute('value');
	const code = root.querySelector('input[name=code]')?.getAttribute('value');

	if (!action || state === undefined || code === undefined) {
		return undefined;
	}

	return { action, state, code };
}
