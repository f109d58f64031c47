// src/mobilelink/errors.ts

/**
 * Base class for every failure the MobileLink client reports.
 * `cause` carries the underlying error where there is one.
 */
export class MobileLinkError extends Error {
	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Wrong username/password, or a cookie/token session that cannot be
 * established with no credential to fall back on. Never retried.
 */
export class InvalidCredentialsError extends MobileLinkError {}

/**
 * The data API stopped accepting the current session.
 * Caught once by fetchDeviceData(); a second occurrence is surfaced.
 */
export class SessionExpiredError extends MobileLinkError {
	public constructor(
		message: string,
		public readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

/** Settings blob, hidden form fields or Self-Asserted body missing or malformed. */
export class ConfigParseError extends MobileLinkError {}

/** Network failure, undecodable JSON, or an unexpected payload shape. */
export class TransportError extends MobileLinkError {}
