/**
 * Component: Error Types
 * Documentation: documentation/operations.md
 */

/**
 * Rejected configuration. Raised while building controllers; the scheduler
 * leaves the affected controller out instead of stopping the process.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failed call to qBittorrent, Sonarr or Radarr. Aborts the current cycle only.
 */
export class IntegrationError extends Error {
  public readonly service: string;
  public readonly status?: number;

  constructor(service: string, message: string, status?: number, options?: { cause?: unknown }) {
    super(`${service}: ${message}`, options);
    this.name = 'IntegrationError';
    this.service = service;
    this.status = status;
  }
}
