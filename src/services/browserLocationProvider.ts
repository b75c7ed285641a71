/**
 * Location provider backed by the browser Geolocation and Permissions APIs.
 */

import type { LocationError } from "../domain/errors";
import {
  AuthorizationState,
  type LocationProvider,
  type LocationProviderListener,
} from "../domain/location/types";
import { GEOLOCATION_OPTIONS } from "../utils/constants";

interface Fix {
  latitude: number;
  longitude: number;
}

export function mapPermissionState(state: PermissionState): AuthorizationState {
  switch (state) {
    case "granted":
      return AuthorizationState.Granted;
    case "denied":
      return AuthorizationState.Denied;
    case "prompt":
      return AuthorizationState.Undetermined;
    default:
      return AuthorizationState.Unknown;
  }
}

export function mapPositionError(
  error: GeolocationPositionError,
): LocationError {
  switch (error.code) {
    case error.PERMISSION_DENIED:
      return { type: "PermissionDenied", message: "Location access denied by user" };
    case error.POSITION_UNAVAILABLE:
      return {
        type: "PositionUnavailable",
        message: "Location information is unavailable",
      };
    case error.TIMEOUT:
      return { type: "Timeout", message: "Location request timed out" };
    default:
      return {
        type: "Unknown",
        message: error.message || "Unknown geolocation error",
      };
  }
}

export class BrowserLocationProvider implements LocationProvider {
  private authorization: AuthorizationState = AuthorizationState.Undetermined;
  private listeners = new Set<LocationProviderListener>();
  // Browsers prompt for permission on the first position request, so the fix
  // obtained while asking is handed to a request made in response to the grant.
  private pendingFix: Fix | null = null;
  private watchingPermission = false;

  constructor(private readonly options: PositionOptions = GEOLOCATION_OPTIONS) {}

  isServiceAvailable(): boolean {
    return typeof navigator !== "undefined" && "geolocation" in navigator;
  }

  currentAuthorization(): AuthorizationState {
    return this.authorization;
  }

  /**
   * Read the permission state once and follow later changes. Without the
   * Permissions API the state stays undetermined until a request resolves it.
   */
  async refreshAuthorization(): Promise<AuthorizationState> {
    if (!this.isServiceAvailable() || !("permissions" in navigator)) {
      return this.authorization;
    }

    try {
      const status = await navigator.permissions.query({ name: "geolocation" });
      this.authorization = mapPermissionState(status.state);

      if (!this.watchingPermission) {
        this.watchingPermission = true;
        status.addEventListener("change", () => {
          this.setAuthorization(mapPermissionState(status.state));
        });
      }
    } catch (error) {
      console.warn("Permissions API unavailable for geolocation:", error);
    }

    return this.authorization;
  }

  requestAuthorization(): void {
    if (!this.isServiceAvailable()) {
      this.notifyFailed({
        type: "ServiceUnavailable",
        message: "Geolocation is not supported by this browser",
      });
      return;
    }

    navigator.geolocation.getCurrentPosition(
      (position) => {
        this.pendingFix = {
          latitude: position.coords.latitude,
          longitude: position.coords.longitude,
        };
        this.setAuthorization(AuthorizationState.Granted);
        // Later requests query the device again.
        this.pendingFix = null;
      },
      (error) => {
        console.warn("Geolocation error:", error.message);
        if (error.code === error.PERMISSION_DENIED) {
          this.setAuthorization(AuthorizationState.Denied);
          return;
        }
        this.notifyFailed(mapPositionError(error));
      },
      this.options,
    );
  }

  requestLocation(): void {
    const fix = this.pendingFix;
    if (fix) {
      this.pendingFix = null;
      this.listeners.forEach((listener) =>
        listener.onLocationReceived(fix.latitude, fix.longitude),
      );
      return;
    }

    if (!this.isServiceAvailable()) {
      this.notifyFailed({
        type: "ServiceUnavailable",
        message: "Geolocation is not supported by this browser",
      });
      return;
    }

    navigator.geolocation.getCurrentPosition(
      (position) => {
        this.listeners.forEach((listener) =>
          listener.onLocationReceived(
            position.coords.latitude,
            position.coords.longitude,
          ),
        );
      },
      (error) => {
        console.warn("Geolocation error:", error.message);
        if (error.code === error.PERMISSION_DENIED) {
          this.authorization = AuthorizationState.Denied;
        }
        this.notifyFailed(mapPositionError(error));
      },
      this.options,
    );
  }

  subscribe(listener: LocationProviderListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private setAuthorization(state: AuthorizationState): void {
    this.authorization = state;
    this.listeners.forEach((listener) => listener.onAuthorizationChanged(state));
  }

  private notifyFailed(error: LocationError): void {
    this.listeners.forEach((listener) => listener.onLocationFailed(error));
  }
}
