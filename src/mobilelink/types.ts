// src/mobilelink/types.ts
// Payload shapes returned by the MobileLink cloud, plus the narrowing helpers
// that turn untyped JSON into them. Fields the API omits stay undefined.

/** Apparatus type code for generator units; other types are skipped. */
export const GENERATOR_APPARATUS_TYPE = 0;

export interface Apparatus {
	apparatusId: number;
	type: number;
	name?: string;
	serialNumber?: string;
	modelNumber?: string;
	localizedAddress?: string;
	preferredDealerName?: string;
	preferredDealerEmail?: string;
	preferredDealerPhone?: string;
	panelId?: string;
}

export interface ApparatusProperty {
	type: number;
	value: string | number;
}

export interface ApparatusWeather {
	temperature?: {
		value?: number;
		unit?: string;
	};
}

export interface ApparatusDetail {
	apparatusStatus?: number;
	deviceType?: string;
	deviceSsid?: string;
	statusLabel?: string;
	statusText?: string;
	activationDate?: string;
	lastSeen?: string;
	connectionTimestamp?: string;
	properties: ApparatusProperty[];
	weather?: ApparatusWeather;
	networkType?: string;
	currentAlarm?: string;
}

/** One generator as returned to callers of fetchDeviceData(). */
export interface Item {
	readonly apparatus: Apparatus;
	readonly apparatusDetail: ApparatusDetail;
}

/** Settings blob embedded in the sign-in page (`var SETTINGS = {...};`). */
export interface SignInConfig {
	csrf?: string;
	transId?: string;
}

export interface SelfAssertedResult {
	status: string;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown): JsonRecord | undefined {
	return isRecord(value) ? value : undefined;
}

function optString(value: unknown): string | undefined {
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'number') {
		return String(value);
	}
	return undefined;
}

function optNumber(value: unknown): number | undefined {
	if (typeof value === 'number' && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '') {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
}

/**
 * Narrow one entry of the device list. Returns undefined when the entry has
 * no usable apparatusId or type.
 */
export function decodeApparatus(value: unknown): Apparatus | undefined {
	const obj = asRecord(value);
	if (!obj) {
		return undefined;
	}

	const apparatusId = optNumber(obj.apparatusId);
	const type = optNumber(obj.type);
	if (apparatusId === undefined || type === undefined) {
		return undefined;
	}

	return {
		apparatusId,
		type,
		name: optString(obj.name),
		serialNumber: optString(obj.serialNumber),
		modelNumber: optString(obj.modelNumber),
		localizedAddress: optString(obj.localizedAddress),
		preferredDealerName: optString(obj.preferredDealerName),
		preferredDealerEmail: optString(obj.preferredDealerEmail),
		preferredDealerPhone: optString(obj.preferredDealerPhone),
		panelId: optString(obj.panelId),
	};
}

function decodeProperties(value: unknown): ApparatusProperty[] {
	if (!Array.isArray(value)) {
		return [];
	}

	const out: ApparatusProperty[] = [];
	for (const entry of value) {
		const obj = asRecord(entry);
		const type = optNumber(obj?.type);
		const raw = obj?.value;
		if (type === undefined) {
			continue;
		}
		if (typeof raw === 'string' || typeof raw === 'number') {
			out.push({ type, value: raw });
		}
	}
	return out;
}

function decodeWeather(value: unknown): ApparatusWeather | undefined {
	const obj = asRecord(value);
	if (!obj) {
		return undefined;
	}

	const temperature = asRecord(obj.temperature);
	if (!temperature) {
		return {};
	}

	return {
		temperature: {
			value: optNumber(temperature.value),
			unit: optString(temperature.unit),
		},
	};
}

/** Narrow a detail record; undefined when the payload is not an object. */
export function decodeApparatusDetail(value: unknown): ApparatusDetail | undefined {
	const obj = asRecord(value);
	if (!obj) {
		return undefined;
	}

	return {
		apparatusStatus: optNumber(obj.apparatusStatus),
		deviceType: optString(obj.deviceType),
		deviceSsid: optString(obj.deviceSsid),
		statusLabel: optString(obj.statusLabel),
		statusText: optString(obj.statusText),
		activationDate: optString(obj.activationDate),
		lastSeen: optString(obj.lastSeen),
		connectionTimestamp: optString(obj.connectionTimestamp),
		properties: decodeProperties(obj.properties),
		weather: decodeWeather(obj.weather),
		networkType: optString(obj.networkType),
		currentAlarm: optString(obj.currentAlarm),
	};
}

export function decodeSignInConfig(value: unknown): SignInConfig | undefined {
	const obj = asRecord(value);
	if (!obj) {
		return undefined;
	}

	return {
		csrf: typeof obj.csrf === 'string' && obj.csrf.length > 0 ? obj.csrf : undefined,
		transId: typeof obj.transId === 'string' && obj.transId.length > 0 ? obj.transId : undefined,
	};
}

export function decodeSelfAssertedResult(value: unknown): SelfAssertedResult | undefined {
	const status = optString(asRecord(value)?.status);
	return status === undefined ? undefined : { status };
}
