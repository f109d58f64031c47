/**
 * Name under which the platform is registered; `platform` in config.json.
 */
export const PLATFORM_NAME = 'MobileLinkGenerator';

/**
 * Must match the `name` in package.json.
 */
export const PLUGIN_NAME = 'homebridge-mobilelink-generator';

export const DEFAULT_POLL_INTERVAL_SECONDS = 30;
export const MIN_POLL_INTERVAL_SECONDS = 10;
