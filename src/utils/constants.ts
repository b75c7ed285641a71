import { createCoordinateValue } from "../domain/coordinates/coordinateValue";
import type { CoordinateSettings } from "../domain/location/types";

export const STORAGE_PREFIX = "coordinates_";
export const MOCK_FALLBACK_KEY = `${STORAGE_PREFIX}mock_fallback_v1`;

// San Francisco
export const DEFAULT_MOCK_COORDINATES = createCoordinateValue(
  37.7749,
  -122.4194,
);

export const DEFAULT_COORDINATE_SETTINGS: CoordinateSettings = {
  useMockFallback: false,
  mockCoordinates: DEFAULT_MOCK_COORDINATES,
};

export const GEOLOCATION_OPTIONS: PositionOptions = {
  enableHighAccuracy: true,
  timeout: 10000,
  maximumAge: 300000, // 5 minutes - browser caches position
};
