/**
 * Coordinates attached to an IP range. Kept as the dataset's text so values are
 * written back out exactly as they were read.
 */
export interface GeoLocation {
  latitude: string;
  longitude: string;
}

/**
 * One row of the IP range dataset
 */
export interface IpRangeRecord extends GeoLocation {
  start: number; // uint32, inclusive
  end: number; // uint32, inclusive
}

export type AbsenceReason =
  | "empty-hostname"
  | "resolution-failed"
  | "no-address"
  | "invalid-address"
  | "no-match";

export interface LocatedOutcome {
  status: "located";
  endpoint: string;
  latitude: string;
  longitude: string;
}

export interface AbsentOutcome {
  status: "absent";
  endpoint: string;
  reason: AbsenceReason;
}

/**
 * Result of resolving and locating a single endpoint
 */
export type ResolutionOutcome = LocatedOutcome | AbsentOutcome;

export function isLocated(
  outcome: ResolutionOutcome
): outcome is LocatedOutcome {
  return outcome.status === "located";
}
