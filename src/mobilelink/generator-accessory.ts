// src/mobilelink/generator-accessory.ts
import type { API, PlatformAccessory } from 'homebridge';

import {
	describeConnection,
	describeFuelType,
	describeStatus,
	findPropertyValue,
	outdoorTemperatureCelsius,
	parseTimestamp,
	PROPERTY_CODES,
	TimestampFormatError,
	type GeneratorStatus,
} from './apparatus-helpers.js';
import type { MobileLinkLogger } from './logger.js';
import type { Item } from './types.js';

// Context stored on the accessory
export interface GeneratorAccessoryContext {
	mobilelink?: {
		apparatusId: string;
		status?: GeneratorStatus;
		outdoorTemperature?: number;
	};
	[key: string]: unknown;
}

// Minimal runtime "env" that accessory code needs from the platform
export interface GeneratorAccessoryEnv {
	log: MobileLinkLogger;
	api: API;
}

const RUNNING_STATUSES: ReadonlySet<GeneratorStatus> = new Set(['Running', 'Exercising']);
const FAULT_STATUSES: ReadonlySet<GeneratorStatus> = new Set(['Warning', 'Stopped', 'Communication Issue']);

export function generatorDisplayName(apparatusId: string, item: Item): string {
	const name = item.apparatus.name?.trim();
	return name && name.length > 0 ? name : `Generator ${apparatusId}`;
}

function describeLastSeen(raw: string | undefined): string {
	if (!raw) {
		return 'never';
	}

	try {
		return parseTimestamp(raw).toISOString();
	} catch (err) {
		if (err instanceof TimestampFormatError) {
			return raw;
		}
		throw err;
	}
}

/**
 * Populate the standard Accessory Information service from the apparatus.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	apparatusId: string,
	item: Item,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	const { apparatus } = item;

	infoService.updateCharacteristic(Characteristic.Name, generatorDisplayName(apparatusId, item));
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'Generac');
	infoService.updateCharacteristic(Characteristic.Model, apparatus.modelNumber?.trim() || 'Generator');
	infoService.updateCharacteristic(Characteristic.SerialNumber, apparatus.serialNumber?.trim() || apparatusId);
}

/**
 * Push one fetch cycle's state onto the accessory: a contact sensor that
 * opens while the generator runs, fault/active flags from the status, and an
 * outdoor temperature sensor when the detail carries weather.
 */
export function applyGeneratorState(
	env: GeneratorAccessoryEnv,
	accessory: PlatformAccessory,
	apparatusId: string,
	item: Item,
): void {
	const { Service, Characteristic } = env.api.hap;
	const displayName = generatorDisplayName(apparatusId, item);

	applyAccessoryInformation(env.api, accessory, apparatusId, item);

	const status = describeStatus(item.apparatusDetail.apparatusStatus);
	const temperature = outdoorTemperatureCelsius(item.apparatusDetail);

	const ctx = accessory.context as GeneratorAccessoryContext;
	const previous = ctx.mobilelink?.status;
	ctx.mobilelink = { apparatusId, status, outdoorTemperature: temperature };

	if (previous !== status) {
		env.log.info('MobileLink: %s status is now %s (apparatusId=%s)', displayName, status, apparatusId);
	}

	const detail = item.apparatusDetail;
	env.log.debug(
		'MobileLink: %s engine hours %d, fuel %s, connection %s, last seen %s',
		displayName,
		findPropertyValue(detail.properties, PROPERTY_CODES.engineHours),
		describeFuelType(detail.properties),
		describeConnection(detail.deviceType),
		describeLastSeen(detail.lastSeen),
	);

	const running =
		accessory.getService(Service.ContactSensor) ||
		accessory.addService(Service.ContactSensor, `${displayName} Running`);

	running.updateCharacteristic(
		Characteristic.ContactSensorState,
		RUNNING_STATUSES.has(status)
			? Characteristic.ContactSensorState.CONTACT_NOT_DETECTED
			: Characteristic.ContactSensorState.CONTACT_DETECTED,
	);
	running.updateCharacteristic(
		Characteristic.StatusFault,
		FAULT_STATUSES.has(status)
			? Characteristic.StatusFault.GENERAL_FAULT
			: Characteristic.StatusFault.NO_FAULT,
	);
	running.updateCharacteristic(Characteristic.StatusActive, status !== 'Communication Issue');

	const existingTemperature = accessory.getService(Service.TemperatureSensor);
	if (temperature === undefined) {
		if (existingTemperature) {
			env.log.debug('MobileLink: removing outdoor temperature from %s; no weather reported.', displayName);
			accessory.removeService(existingTemperature);
		}
		return;
	}

	const temperatureService =
		existingTemperature ||
		accessory.addService(Service.TemperatureSensor, `${displayName} Outdoor`);
	temperatureService.updateCharacteristic(Characteristic.CurrentTemperature, temperature);
}

/** Flag a generator the last refresh did not return as inactive. */
export function markGeneratorUnavailable(api: API, accessory: PlatformAccessory): void {
	const running = accessory.getService(api.hap.Service.ContactSensor);
	running?.updateCharacteristic(api.hap.Characteristic.StatusActive, false);
}
