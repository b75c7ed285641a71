export type { CoordinateValue } from "./domain/coordinates/coordinateValue";
export {
  LATITUDE_BOUNDS,
  LONGITUDE_BOUNDS,
  ZERO_COORDINATES,
  coordinatesEqual,
  createCoordinateValue,
  formatCoordinate,
  formattedLatitude,
  formattedLongitude,
  isCoordinateInRange,
  isValidLatitude,
  isValidLongitude,
} from "./domain/coordinates/coordinateValue";
export {
  validateCoordinateField,
  validateCoordinateInput,
} from "./domain/coordinates/validation";
export type {
  CoordinateField,
  CoordinateValidationError,
  LocationError,
} from "./domain/errors";
export type { Result } from "./domain/result";
export { err, ok } from "./domain/result";
export type {
  CoordinateSettings,
  LocationProvider,
  LocationProviderListener,
} from "./domain/location/types";
export { AuthorizationState } from "./domain/location/types";
export type { CoordinatePhase } from "./domain/location/coordinateMachine";
export { coordinateMachine } from "./domain/location/coordinateMachine";
export type {
  CoordinateState,
  CoordinateStateListener,
} from "./domain/location/coordinateStateManager";
export { CoordinateStateManager } from "./domain/location/coordinateStateManager";
export { BrowserLocationProvider } from "./services/browserLocationProvider";
export {
  getMockFallbackPreference,
  loadCoordinateSettings,
  setMockFallbackPreference,
} from "./services/coordinatePreferences";
export { formatLocationError } from "./utils/locationError";
export { useCoordinates } from "./hooks/useCoordinates";
export { useCoordinateForm } from "./hooks/useCoordinateForm";
