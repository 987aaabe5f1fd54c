/**
 * Base class for every error raised by the relay geolocator
 */
export class RelayGeoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised by the address codec for anything that is not a dotted-quad IPv4 literal
 */
export class InvalidAddressError extends RelayGeoError {
  constructor(public readonly address: string, reason: string) {
    super(`Invalid IPv4 address "${address}": ${reason}`);
  }
}

/**
 * The dataset could not be downloaded or decompressed. Fatal for a run.
 */
export class DatasetAcquisitionError extends RelayGeoError {}

/**
 * The dataset file exists but could not be read. Fatal for a run.
 */
export class DatasetLoadError extends RelayGeoError {}

export class CliUsageError extends RelayGeoError {}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
