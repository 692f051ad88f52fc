/**
 * Permission set session durations are configured in whole hours and handed
 * to the provisioning module as ISO-8601 time durations (PT<h>H)
 */

export const InvalidDurationError = new Error("Invalid duration");

export function hoursToISODuration(hours: number): string {
  if (!Number.isInteger(hours) || hours <= 0) {
    throw InvalidDurationError;
  }
  return `PT${hours}H`;
}
