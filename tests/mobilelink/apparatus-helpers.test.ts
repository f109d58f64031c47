import { describe, expect, it } from 'vitest';

import {
	describeConnection,
	describeFuelType,
	describeStatus,
	findPropertyValue,
	outdoorTemperatureCelsius,
	parseTimestamp,
	PROPERTY_CODES,
	TimestampFormatError,
} from '../../src/mobilelink/apparatus-helpers.js';

describe('findPropertyValue', () => {
	it('prefers the first code present', () => {
		const properties = [
			{ type: 70, value: '99.0' },
			{ type: 71, value: '150.5' },
		];

		expect(findPropertyValue(properties, PROPERTY_CODES.engineHours)).toBe(150.5);
	});

	it('falls back to later codes when the earlier ones are absent', () => {
		expect(findPropertyValue([{ type: 70, value: '123.5' }], PROPERTY_CODES.engineHours)).toBe(123.5);
	});

	it('returns numeric values unchanged', () => {
		expect(findPropertyValue([{ type: 95, value: 12 }], PROPERTY_CODES.exerciseMinutes)).toBe(12);
	});

	it('returns the fallback when nothing matches or the value is not numeric', () => {
		expect(findPropertyValue([], PROPERTY_CODES.protectionHours)).toBe(0);
		expect(findPropertyValue([{ type: 32, value: 'n/a' }], PROPERTY_CODES.protectionHours, -1)).toBe(-1);
	});
});

describe('parseTimestamp', () => {
	it('parses timestamps with fractional seconds', () => {
		expect(parseTimestamp('2024-05-01T10:15:00.123+00:00').toISOString()).toBe('2024-05-01T10:15:00.123Z');
		expect(parseTimestamp('2024-05-01T10:15:00.5Z').toISOString()).toBe('2024-05-01T10:15:00.500Z');
	});

	it('parses timestamps without fractional seconds and applies the offset', () => {
		expect(parseTimestamp('2024-05-01T10:15:00-0500').toISOString()).toBe('2024-05-01T15:15:00.000Z');
		expect(parseTimestamp('2024-05-01T10:15:00+02:00').toISOString()).toBe('2024-05-01T08:15:00.000Z');
	});

	it('names both accepted formats when nothing matches', () => {
		expect(() => parseTimestamp('yesterday')).toThrow(
			'No known datetime format for raw string yesterday (tried %Y-%m-%dT%H:%M:%S.%f%z, %Y-%m-%dT%H:%M:%S%z)',
		);
	});

	it('rejects out-of-range fields and missing offsets', () => {
		expect(() => parseTimestamp('2024-02-30T00:00:00Z')).toThrow(TimestampFormatError);
		expect(() => parseTimestamp('2024-05-01T10:15:00')).toThrow(TimestampFormatError);
	});
});

describe('describeStatus', () => {
	it.each([
		[1, 'Ready'],
		[2, 'Running'],
		[3, 'Exercising'],
		[4, 'Warning'],
		[5, 'Stopped'],
		[6, 'Communication Issue'],
		[7, 'Unknown'],
		[0, 'Unknown'],
		[42, 'Unknown'],
		[undefined, 'Unknown'],
	])('maps %s to %s', (code, label) => {
		expect(describeStatus(code)).toBe(label);
	});
});

describe('describeConnection', () => {
	it('maps known device types', () => {
		expect(describeConnection('wifi')).toBe('Wifi');
		expect(describeConnection('eth')).toBe('Ethernet');
		expect(describeConnection('lte')).toBe('MobileData');
		expect(describeConnection('cdma')).toBe('MobileData');
		expect(describeConnection(undefined)).toBe('Unknown');
	});
});

describe('describeFuelType', () => {
	it('reads property 88', () => {
		expect(describeFuelType([{ type: 88, value: '1' }])).toBe('Natural Gas');
		expect(describeFuelType([{ type: 88, value: 2 }])).toBe('Propane');
		expect(describeFuelType([{ type: 88, value: '7' }])).toBe('Unknown');
		expect(describeFuelType([])).toBe('Unknown');
	});
});

describe('outdoorTemperatureCelsius', () => {
	it('converts Fahrenheit to Celsius with one decimal', () => {
		expect(outdoorTemperatureCelsius({ properties: [], weather: { temperature: { value: 77, unit: '°F' } } })).toBe(25);
		expect(outdoorTemperatureCelsius({ properties: [], weather: { temperature: { value: 33, unit: 'F' } } })).toBe(0.6);
	});

	it('passes Celsius through', () => {
		expect(outdoorTemperatureCelsius({ properties: [], weather: { temperature: { value: 21.5, unit: 'C' } } })).toBe(21.5);
	});

	it('returns undefined without weather', () => {
		expect(outdoorTemperatureCelsius({ properties: [] })).toBeUndefined();
		expect(outdoorTemperatureCelsius({ properties: [], weather: {} })).toBeUndefined();
	});
});
