import type { CoordinateValue } from "../coordinates/coordinateValue";
import type { LocationError } from "../errors";

export const AuthorizationState = {
  Undetermined: "undetermined",
  Granted: "granted",
  Denied: "denied",
  Restricted: "restricted",
  Unknown: "unknown",
} as const;

export type AuthorizationState =
  (typeof AuthorizationState)[keyof typeof AuthorizationState];

const KNOWN_AUTHORIZATION_STATES: ReadonlySet<string> = new Set(
  Object.values(AuthorizationState),
);

export function isAuthorizationState(value: string): value is AuthorizationState {
  return KNOWN_AUTHORIZATION_STATES.has(value);
}

/** Anything a provider reports outside the known set is treated as unknown. */
export function normalizeAuthorizationState(value: string): AuthorizationState {
  return isAuthorizationState(value) ? value : AuthorizationState.Unknown;
}

export interface LocationProviderListener {
  onLocationReceived(latitude: number, longitude: number): void;
  onLocationFailed(error: LocationError): void;
  onAuthorizationChanged(state: AuthorizationState): void;
}

/**
 * Device location capability. `requestAuthorization` and `requestLocation`
 * return immediately and report back through subscribed listeners.
 */
export interface LocationProvider {
  isServiceAvailable(): boolean;
  currentAuthorization(): AuthorizationState;
  requestAuthorization(): void;
  requestLocation(): void;
  subscribe(listener: LocationProviderListener): () => void;
}

export interface CoordinateSettings {
  /**
   * Apply `mockCoordinates` instead of (0, 0) when the initial request fails
   * or the provider reports a generic failure, without showing a message.
   */
  useMockFallback: boolean;
  mockCoordinates: CoordinateValue;
}
