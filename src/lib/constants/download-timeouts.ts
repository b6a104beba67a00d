/**
 * Component: Integration Timeout Constants
 * Documentation: documentation/integrations.md
 */

/** Timeout for qBittorrent Web API calls (ms) */
export const TORRENT_CLIENT_TIMEOUT = 30000;

/** Timeout for Sonarr/Radarr API calls (ms) */
export const QUEUE_MANAGER_TIMEOUT = 60000;
