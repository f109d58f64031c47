// src/mobilelink/credential-check.ts
import { InvalidCredentialsError } from './errors.js';
import type { MobileLinkLogger } from './logger.js';
import type { MobileLinkClient } from './mobilelink-client.js';

export type CredentialCheckFailure = 'auth' | 'internal';

/**
 * Run one full fetch to see whether the configured credential works.
 * null on success; 'auth' when the credential was rejected; 'internal' for
 * anything else (network, parse, repeated expiry).
 */
export async function verifyCredentials(
	client: MobileLinkClient,
	log: MobileLinkLogger,
): Promise<CredentialCheckFailure | null> {
	try {
		await client.fetchDeviceData();
		return null;
	} catch (err) {
		if (err instanceof InvalidCredentialsError) {
			log.debug('MobileLink: credential check rejected: %s', err.message);
			return 'auth';
		}

		log.debug('MobileLink: credential check failed: %s', err instanceof Error ? err.message : String(err));
		return 'internal';
	}
}
