import type { LocationError } from "../domain/errors";

export const LOCATION_DENIED_MESSAGE =
  "Location access denied. Please enable in Settings.";
export const LOCATION_DISABLED_MESSAGE =
  "Location services are disabled. Please enable them in Settings.";
export const NETWORK_ERROR_MESSAGE =
  "Network error. Please check your connection.";
export const UNKNOWN_AUTHORIZATION_MESSAGE = "Unknown authorization status.";

export function formatLocationError(error: LocationError): string {
  switch (error.type) {
    case "ServiceUnavailable":
      return LOCATION_DISABLED_MESSAGE;
    case "PermissionDenied":
      return LOCATION_DENIED_MESSAGE;
    case "Network":
      return NETWORK_ERROR_MESSAGE;
    case "UnknownAuthorization":
      return UNKNOWN_AUTHORIZATION_MESSAGE;
    default:
      return `Error getting location: ${error.message}`;
  }
}
