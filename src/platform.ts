// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logging,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { verifyCredentials } from './mobilelink/credential-check.js';
import { InvalidCredentialsError } from './mobilelink/errors.js';
import {
	applyGeneratorState,
	generatorDisplayName,
	markGeneratorUnavailable,
	type GeneratorAccessoryContext,
	type GeneratorAccessoryEnv,
} from './mobilelink/generator-accessory.js';
import type { MobileLinkLogger } from './mobilelink/logger.js';
import { MobileLinkClient } from './mobilelink/mobilelink-client.js';
import type { Item } from './mobilelink/types.js';
import { parsePlatformConfig } from './platform-config.js';

// Successful refreshes a generator may be missing from before its accessory
// is unregistered. A failed detail fetch drops a unit from a single refresh.
export const MISSED_REFRESHES_BEFORE_REMOVAL = 3;

const toMobileLinkLogger = (log: Logging): MobileLinkLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class MobileLinkPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logging;
	private readonly api: API;
	private readonly client: MobileLinkClient | null = null;
	private readonly accessoryEnv: GeneratorAccessoryEnv;
	private readonly pollIntervalMs: number = 0;

	private readonly missedRefreshes = new Map<string, number>();

	private pollTimer: NodeJS.Timeout | null = null;
	private refreshInFlight = false;
	private stopped = false;

	constructor(log: Logging, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;
		this.accessoryEnv = { log: toMobileLinkLogger(log), api };

		const parsed = parsePlatformConfig(config);
		if (!parsed.ok) {
			this.log.warn('MobileLink: %s in config.json; skipping cloud login.', parsed.problem);
			return;
		}

		const { settings } = parsed;
		this.pollIntervalMs = settings.pollIntervalMs;
		this.client = new MobileLinkClient(settings.credential, {
			apiBase: settings.apiBase,
			loginBase: settings.loginBase,
			logger: this.accessoryEnv.log,
		});

		this.log.info(config.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.start();
		});
		this.api.on('shutdown', () => {
			this.stop();
		});
	}

	private async start(): Promise<void> {
		if (!this.client) {
			return;
		}

		const failure = await verifyCredentials(this.client, this.accessoryEnv.log);
		if (failure === 'auth') {
			this.log.error('MobileLink: credentials rejected at startup; polling disabled. Fix the plugin config and restart.');
			return;
		}
		if (failure === 'internal') {
			this.log.warn('MobileLink: startup check failed; polling anyway.');
		}

		if (this.stopped) {
			this.log.debug('MobileLink: shut down before polling started.');
			return;
		}
		await this.refresh();

		if (this.stopped) {
			this.log.debug('MobileLink: shut down before polling started.');
			return;
		}
		this.pollTimer = setInterval(() => {
			void this.refresh();
		}, this.pollIntervalMs);
	}

	private stop(): void {
		this.stopped = true;
		if (this.pollTimer) {
			clearInterval(this.pollTimer);
			this.pollTimer = null;
		}
	}

	/**
	 * One fetch cycle. Ticks that arrive while a fetch is still running are
	 * dropped: the client supports a single fetch in flight.
	 */
	public async refresh(): Promise<void> {
		if (!this.client) {
			return;
		}
		if (this.refreshInFlight) {
			this.log.debug('MobileLink: previous refresh still running; skipping this tick.');
			return;
		}

		this.refreshInFlight = true;
		try {
			const generators = await this.client.fetchDeviceData();
			if (!generators) {
				this.log.warn('MobileLink: no apparatus data returned from cloud; nothing to update.');
				return;
			}

			this.syncAccessories(generators);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			if (err instanceof InvalidCredentialsError) {
				this.log.error('MobileLink: credentials rejected (%s). Fix the plugin config and restart.', message);
			} else {
				this.log.error('MobileLink: refresh failed: %s', message);
			}
		} finally {
			this.refreshInFlight = false;
		}
	}

	private syncAccessories(generators: Map<string, Item>): void {
		const seen = new Set<string>();

		for (const [apparatusId, item] of generators) {
			const displayName = generatorDisplayName(apparatusId, item);
			const uuid = this.api.hap.uuid.generate(`mobilelink-${apparatusId}`);
			seen.add(uuid);

			let accessory = this.accessories.find(acc => acc.UUID === uuid);

			if (!accessory) {
				this.log.info('MobileLink: registering new accessory for %s (apparatusId=%s)', displayName, apparatusId);

				accessory = new this.api.platformAccessory(displayName, uuid);
				const ctx = accessory.context as GeneratorAccessoryContext;
				ctx.mobilelink = { apparatusId };

				this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
				this.accessories.push(accessory);
			}

			applyGeneratorState(this.accessoryEnv, accessory, apparatusId, item);
		}

		const stale: PlatformAccessory[] = [];
		for (const accessory of this.accessories) {
			if (seen.has(accessory.UUID)) {
				this.missedRefreshes.delete(accessory.UUID);
				continue;
			}

			const missed = (this.missedRefreshes.get(accessory.UUID) ?? 0) + 1;
			if (missed < MISSED_REFRESHES_BEFORE_REMOVAL) {
				this.missedRefreshes.set(accessory.UUID, missed);
				this.log.warn(
					'MobileLink: %s missing from refresh (%d/%d); marking inactive.',
					accessory.displayName,
					missed,
					MISSED_REFRESHES_BEFORE_REMOVAL,
				);
				markGeneratorUnavailable(this.api, accessory);
				continue;
			}

			this.missedRefreshes.delete(accessory.UUID);
			stale.push(accessory);
		}

		if (stale.length === 0) {
			return;
		}

		for (const accessory of stale) {
			this.log.info('MobileLink: removing accessory %s; generator no longer on the account.', accessory.displayName);
			this.accessories.splice(this.accessories.indexOf(accessory), 1);
		}
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
	}
}
