/**
 * Component: Retry Thresholds
 * Documentation: documentation/retry.md
 */

/** Strikes after which a stalled download is removed and blocklisted */
export const MAX_STRIKES = 5;

/** Minimum time between two strike samples of the same download (seconds) */
export const STALLED_SAMPLE_INTERVAL = 5 * 60;

/** Bounds accepted for a configured sampling interval (seconds) */
export const STALLED_SAMPLE_INTERVAL_MIN = 60;
export const STALLED_SAMPLE_INTERVAL_MAX = 24 * 60 * 60;

/** Age after which a download that never received a byte is dropped (seconds) */
export const STALE_DOWNLOAD_TIMEOUT = 60 * 60;

/** Grace window after a manager restart during which an empty queue is not trusted (seconds) */
export const MANAGER_RESTART_GRACE = 2 * 60;

/** Manager status text markers */
export const STALLED_MESSAGE_MARKER = 'The download is stalled';
export const DANGEROUS_FILE_MARKER = 'Found potentially dangerous file';

/** Polling interval bounds and default (seconds) */
export const REFRESH_INTERVAL_DEFAULT = 60;
export const REFRESH_INTERVAL_MIN = 60;
export const REFRESH_INTERVAL_MAX = 3600;
