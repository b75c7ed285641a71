import {
  ZERO_COORDINATES,
  isCoordinateInRange,
  type CoordinateValue,
} from "../coordinates/coordinateValue";
import type { LocationError } from "../errors";
import { DEFAULT_MOCK_COORDINATES } from "../../utils/constants";
import { formatLocationError } from "../../utils/locationError";
import type { CoordinateSettings } from "./types";

/**
 * - `refused`: the request could not start or permission was refused
 * - `initialFailure`: the first request failed before the user asked for anything
 * - `providerFailure`: a later request failed for a reason other than permission or network
 */
export type FallbackReason = "refused" | "initialFailure" | "providerFailure";

/** Replaces an out-of-range mock value with the default one. */
export function resolveCoordinateSettings(
  settings: CoordinateSettings,
): CoordinateSettings {
  if (isCoordinateInRange(settings.mockCoordinates)) return settings;
  console.warn(
    "Mock coordinates out of range, using defaults:",
    settings.mockCoordinates,
  );
  return { ...settings, mockCoordinates: DEFAULT_MOCK_COORDINATES };
}

export function resolveFallback(
  settings: CoordinateSettings,
  reason: FallbackReason,
): CoordinateValue {
  if (reason !== "refused" && settings.useMockFallback) {
    return settings.mockCoordinates;
  }
  return ZERO_COORDINATES;
}

export interface FailureOutcome {
  /** `null` keeps the current coordinates. */
  coordinates: CoordinateValue | null;
  errorMessage: string | null;
}

export function resolveLocationFailure(
  error: LocationError,
  isInitialRequest: boolean,
  settings: CoordinateSettings,
): FailureOutcome {
  if (isInitialRequest) {
    return {
      coordinates: resolveFallback(settings, "initialFailure"),
      errorMessage: null,
    };
  }

  switch (error.type) {
    case "PermissionDenied":
      return {
        coordinates: resolveFallback(settings, "refused"),
        errorMessage: formatLocationError(error),
      };
    case "Network":
      return { coordinates: null, errorMessage: formatLocationError(error) };
    default:
      return {
        coordinates: resolveFallback(settings, "providerFailure"),
        errorMessage: settings.useMockFallback
          ? null
          : formatLocationError(error),
      };
  }
}
