// src/mobilelink/login-flow.ts
// Browser-style sign-in against the MobileLink identity provider.
//
// The sequence is forward-only:
//   1. GET {apiBase}/Auth/SignIn, following redirects to the provider's page.
//   2. If that page already carries the final state/code form, post it and stop.
//   3. Pull csrf + transId out of the page's `var SETTINGS = ...;` line.
//   4. POST the credentials to SelfAsserted.
//   5. GET the confirmation page and post its final state/code form.
// Any failure aborts the login; nothing is retried here.

import {
	ConfigParseError,
	InvalidCredentialsError,
	MobileLinkError,
	TransportError,
} from './errors.js';
import type { SessionHttp, SessionRequestOptions, SessionResponse } from './http-session.js';
import type { MobileLinkLogger } from './logger.js';
import { extractFinalForm, extractSettingsJson } from './page-scraper.js';
import type { SessionState } from './session-state.js';
import { decodeSelfAssertedResult, decodeSignInConfig } from './types.js';

export const SIGN_IN_POLICY = 'B2C_1A_SignUpOrSigninOnline';

export interface LoginFlowEndpoints {
	apiBase: string;
	loginBase: string;
}

export class LoginFlow {
	public constructor(
		private readonly endpoints: LoginFlowEndpoints,
		private readonly session: SessionState,
		private readonly http: SessionHttp,
		private readonly log: MobileLinkLogger,
	) {}

	public async run(username: string, password: string): Promise<void> {
		const email = username.trim();

		// 1) Initiate
		const signIn = await this.request(
			`${this.endpoints.apiBase}/Auth/SignIn?email=${encodeURIComponent(email)}`,
		);
		const signInPage = await this.readText(signIn, 'sign-in page');

		// 2) Early exit: the provider still has a live session for this account.
		if (await this.submitFinalForm(signInPage, signIn.url)) {
			this.log.debug('MobileLink: reused existing sign-in session for %s', email);
			return;
		}

		// 3) Extract settings
		const settings = extractSettingsJson(signInPage);
		if (settings === undefined) {
			this.log.debug('MobileLink: unable to find sign-in settings in login page:\n%s', signInPage);
			throw new ConfigParseError('Unable to find csrf token in login page');
		}

		const config = decodeSignInConfig(settings);
		if (!config?.csrf || !config.transId) {
			throw new ConfigParseError('Missing csrf and/or transId in sign in config');
		}

		this.session.csrfToken = config.csrf;
		const csrfHeaders = { 'X-Csrf-Token': config.csrf };
		const tx = `StateProperties=${config.transId}`;

		// 4) Self-Asserted submission
		const selfAsserted = await this.request(`${this.endpoints.loginBase}/SelfAsserted`, {
			method: 'POST',
			headers: csrfHeaders,
			params: { tx, p: SIGN_IN_POLICY },
			form: {
				request_type: 'RESPONSE',
				signInName: email,
				password,
			},
		});

		if (selfAsserted.response.status !== 200) {
			throw new TransportError(
				`SelfAsserted: Bad response status: ${selfAsserted.response.status}`,
			);
		}

		const selfAssertedBody = await this.readText(selfAsserted, 'SelfAsserted response');
		let parsed: unknown;
		try {
			parsed = JSON.parse(selfAssertedBody);
		} catch (err) {
			this.log.debug('MobileLink: SelfAsserted returned non-JSON payload:\n%s', selfAssertedBody);
			throw new ConfigParseError('SelfAsserted returned a non-JSON payload', { cause: err });
		}

		const result = decodeSelfAssertedResult(parsed);
		if (!result) {
			throw new ConfigParseError('SelfAsserted response is missing "status"');
		}
		if (result.status !== '200') {
			throw new InvalidCredentialsError(`Sign-in rejected (status ${result.status})`);
		}

		// 5) Confirm and submit
		const confirmed = await this.request(
			`${this.endpoints.loginBase}/api/CombinedSigninAndSignup/confirmed`,
			{
				headers: csrfHeaders,
				params: { csrf_token: config.csrf, tx, p: SIGN_IN_POLICY },
			},
		);

		if (confirmed.response.status !== 200) {
			throw new TransportError(
				`CombinedSigninAndSignup: Bad response status: ${confirmed.response.status}`,
			);
		}

		const confirmedPage = await this.readText(confirmed, 'confirmation page');
		if (!(await this.submitFinalForm(confirmedPage, confirmed.url))) {
			this.log.debug('MobileLink: confirmation page without a submit form:\n%s', confirmedPage);
			throw new ConfigParseError('Error parsing HTML submit form');
		}

		this.log.debug('MobileLink: sign-in completed for %s', email);
		this.log.info('MobileLink: signed in.');
	}

	/**
	 * Post the page's final state/code form, if it has one.
	 * Returns false when the form is absent; a non-200 answer is fatal.
	 */
	private async submitFinalForm(page: string, pageUrl: string): Promise<boolean> {
		const form = extractFinalForm(page);
		if (!form) {
			this.log.debug('MobileLink: page has no final login form.');
			return false;
		}

		const action = new URL(form.action, pageUrl).toString();
		const submitted = await this.request(action, {
			method: 'POST',
			form: { state: form.state, code: form.code },
		});

		if (submitted.response.status !== 200) {
			throw new TransportError(`Bad api login response: ${submitted.response.status}`);
		}

		return true;
	}

	private async request(url: string, options?: SessionRequestOptions): Promise<SessionResponse> {
		try {
			return await this.http.send(url, options);
		} catch (err) {
			if (err instanceof MobileLinkError) {
				throw err;
			}
			throw new TransportError(`Login request to ${new URL(url).pathname} failed`, { cause: err });
		}
	}

	private async readText(result: SessionResponse, what: string): Promise<string> {
		try {
			return await result.response.text();
		} catch (err) {
			throw new TransportError(`Unable to read ${what}`, { cause: err });
		}
	}
}
