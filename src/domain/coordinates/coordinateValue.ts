import type { CoordinateBounds } from "../errors";

export interface CoordinateValue {
  readonly latitude: number;
  readonly longitude: number;
}

export const LATITUDE_BOUNDS: CoordinateBounds = { min: -90, max: 90 };
export const LONGITUDE_BOUNDS: CoordinateBounds = { min: -180, max: 180 };

/**
 * Builds a frozen coordinate pair. Range is not checked here; callers validate
 * before committing a value to state.
 */
export function createCoordinateValue(
  latitude: number,
  longitude: number,
): CoordinateValue {
  return Object.freeze({ latitude, longitude });
}

export const ZERO_COORDINATES: CoordinateValue = createCoordinateValue(0, 0);

export function isValidLatitude(value: number): boolean {
  return value >= LATITUDE_BOUNDS.min && value <= LATITUDE_BOUNDS.max;
}

export function isValidLongitude(value: number): boolean {
  return value >= LONGITUDE_BOUNDS.min && value <= LONGITUDE_BOUNDS.max;
}

export function isCoordinateInRange(value: CoordinateValue): boolean {
  return isValidLatitude(value.latitude) && isValidLongitude(value.longitude);
}

export function coordinatesEqual(
  a: CoordinateValue,
  b: CoordinateValue,
): boolean {
  return a.latitude === b.latitude && a.longitude === b.longitude;
}

/**
 * Two fractional digits with "." as separator. `toFixed` rounds the exact
 * binary value half away from zero; a result of "-0.00" is printed as "0.00".
 */
export function formatCoordinate(value: number): string {
  const text = value.toFixed(2);
  return text === "-0.00" ? "0.00" : text;
}

export function formattedLatitude(value: CoordinateValue): string {
  return formatCoordinate(value.latitude);
}

export function formattedLongitude(value: CoordinateValue): string {
  return formatCoordinate(value.longitude);
}
