/**
 * URL Utilities for service endpoints and tracker announce URLs
 * Documentation: documentation/integrations.md
 */

import { ConfigurationError } from './errors';

/**
 * Normalize a configured service URL for use as an axios base URL
 *
 * @returns URL without trailing slashes
 *
 * @example
 * normalizeBaseUrl('http://sonarr:8989/') // 'http://sonarr:8989'
 * normalizeBaseUrl('http://qbit:8080/qbt//') // 'http://qbit:8080/qbt'
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');

  if (!trimmed.startsWith('http://') && !trimmed.startsWith('https://')) {
    throw new ConfigurationError(`Invalid service URL "${url}". URLs must start with http:// or https://`);
  }

  return trimmed;
}

/**
 * Extract the host of a tracker announce URL
 *
 * qBittorrent lists DHT, PeX and LSD as pseudo-trackers (`** [DHT] **`);
 * those do not parse and yield null.
 *
 * @example
 * getTrackerHost('https://tracker.example.org:443/announce?passkey=abc') // 'tracker.example.org'
 * getTrackerHost('** [DHT] **') // null
 */
export function getTrackerHost(announceUrl: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(announceUrl);
  } catch {
    return null;
  }

  return parsed.hostname.length > 0 ? parsed.hostname : null;
}
