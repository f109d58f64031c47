// src/mobilelink/apparatus-helpers.ts
import type { ApparatusDetail, ApparatusProperty } from './types.js';

/**
 * Property type codes, newest API generation first.
 * The same code can mean different things across generations (70 is battery
 * voltage on v5 but engine hours on v2), so lookups go code by code.
 */
export const PROPERTY_CODES = {
	engineHours: [71, 70],
	protectionHours: [32, 31],
	batteryVoltage: [70, 69],
	exerciseMinutes: [95],
	fuelType: [88],
} as const satisfies Record<string, readonly number[]>;

/**
 * Return the value of the first candidate code present in `properties`.
 * Later codes are only consulted when no property carries an earlier one.
 * String values are parsed as floats; `fallback` covers "not found".
 */
export function findPropertyValue(
	properties: readonly ApparatusProperty[],
	codes: readonly number[],
	fallback = 0,
): number {
	for (const code of codes) {
		const match = properties.find((prop) => prop.type === code);
		if (!match) {
			continue;
		}

		if (typeof match.value === 'number') {
			return match.value;
		}

		const parsed = Number.parseFloat(match.value);
		return Number.isNaN(parsed) ? fallback : parsed;
	}

	return fallback;
}

export const TIMESTAMP_PATTERNS = ['%Y-%m-%dT%H:%M:%S.%f%z', '%Y-%m-%dT%H:%M:%S%z'] as const;

export class TimestampFormatError extends Error {
	public constructor(public readonly raw: string) {
		super(`No known datetime format for raw string ${raw} (tried ${TIMESTAMP_PATTERNS.join(', ')})`);
		this.name = 'TimestampFormatError';
	}
}

const TIMESTAMP_WITH_FRACTION =
	/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,6})(Z|[+-]\d{2}:?\d{2})$/;
const TIMESTAMP_WITHOUT_FRACTION =
	/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(Z|[+-]\d{2}:?\d{2})$/;

function offsetMinutes(zone: string): number {
	if (zone === 'Z') {
		return 0;
	}

	const sign = zone.startsWith('-') ? -1 : 1;
	const digits = zone.slice(1).replace(':', '');
	const hours = Number(digits.slice(0, 2));
	const minutes = Number(digits.slice(2, 4));
	return sign * (hours * 60 + minutes);
}

function buildDate(
	parts: readonly string[],
	fraction: string,
	zone: string,
): Date | undefined {
	const [year, month, day, hour, minute, second] = parts.map(Number);
	const millis = Math.floor(Number(fraction.padEnd(6, '0')) / 1000);

	const local = Date.UTC(year, month - 1, day, hour, minute, second, millis);
	const check = new Date(local);

	// Date.UTC rolls over out-of-range fields; reject those instead.
	if (
		check.getUTCFullYear() !== year ||
		check.getUTCMonth() !== month - 1 ||
		check.getUTCDate() !== day ||
		check.getUTCHours() !== hour ||
		check.getUTCMinutes() !== minute ||
		check.getUTCSeconds() !== second
	) {
		return undefined;
	}

	return new Date(local - offsetMinutes(zone) * 60_000);
}

/**
 * Parse the API's ISO-like timestamps, with or without fractional seconds.
 * The offset is mandatory (`Z`, `+HH:MM` or `+HHMM`).
 */
export function parseTimestamp(raw: string): Date {
	const withFraction = TIMESTAMP_WITH_FRACTION.exec(raw);
	if (withFraction) {
		const date = buildDate(withFraction.slice(1, 7), withFraction[7], withFraction[8]);
		if (date) {
			return date;
		}
	}

	const withoutFraction = TIMESTAMP_WITHOUT_FRACTION.exec(raw);
	if (withoutFraction) {
		const date = buildDate(withoutFraction.slice(1, 7), '0', withoutFraction[7]);
		if (date) {
			return date;
		}
	}

	throw new TimestampFormatError(raw);
}

export const STATUS_LABELS = [
	'Ready',
	'Running',
	'Exercising',
	'Warning',
	'Stopped',
	'Communication Issue',
	'Unknown',
] as const;

export type GeneratorStatus = typeof STATUS_LABELS[number];

/** apparatusStatus is 1-based; anything outside the table is Unknown. */
export function describeStatus(apparatusStatus: number | undefined): GeneratorStatus {
	const unknown = STATUS_LABELS[STATUS_LABELS.length - 1];
	if (apparatusStatus === undefined) {
		return unknown;
	}

	const index = apparatusStatus - 1;
	return index >= 0 && index < STATUS_LABELS.length ? STATUS_LABELS[index] : unknown;
}

export type ConnectionType = 'Wifi' | 'Ethernet' | 'MobileData' | 'Unknown';

export function describeConnection(deviceType: string | undefined): ConnectionType {
	switch (deviceType) {
	case 'wifi':
		return 'Wifi';
	case 'eth':
		return 'Ethernet';
	case 'lte':
	case 'cdma':
		return 'MobileData';
	default:
		return 'Unknown';
	}
}

export type FuelType = 'Natural Gas' | 'Propane' | 'Unknown';

export function describeFuelType(properties: readonly ApparatusProperty[]): FuelType {
	const code = Math.trunc(findPropertyValue(properties, PROPERTY_CODES.fuelType, 0));
	if (code === 1) {
		return 'Natural Gas';
	}
	if (code === 2) {
		return 'Propane';
	}
	return 'Unknown';
}

/** Outdoor temperature in Celsius, or undefined when the detail has none. */
export function outdoorTemperatureCelsius(detail: ApparatusDetail): number | undefined {
	const temperature = detail.weather?.temperature;
	if (temperature?.value === undefined) {
		return undefined;
	}

	const isFahrenheit = (temperature.unit ?? '').toLowerCase().includes('f');
	if (!isFahrenheit) {
		return temperature.value;
	}

	return Math.round(((temperature.value - 32) * 5 / 9) * 10) / 10;
}
