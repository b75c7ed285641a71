import { useCallback, useEffect, useRef } from "react";
import { useSelector } from "@xstate/react";
import type { CoordinateValue } from "../domain/coordinates/coordinateValue";
import type { CoordinateValidationError, LocationError } from "../domain/errors";
import type { CoordinatePhase } from "../domain/location/coordinateMachine";
import type { CoordinateStateManager } from "../domain/location/coordinateStateManager";
import type { AuthorizationState } from "../domain/location/types";
import type { Result } from "../domain/result";

interface UseCoordinatesOptions {
  /** Issue the first location request once the component mounts. */
  requestOnMount?: boolean;
}

export interface UseCoordinatesReturn {
  coordinates: CoordinateValue;
  phase: CoordinatePhase;
  authorizationState: AuthorizationState;
  isLoading: boolean;
  lastError: LocationError | null;
  errorMessage: string | null;
  requestLocation: () => void;
  applyManualEdit: (
    latitudeText: string,
    longitudeText: string,
  ) => Result<CoordinateValue, CoordinateValidationError>;
  setMockLocation: () => void;
}

export function useCoordinates(
  manager: CoordinateStateManager,
  { requestOnMount = false }: UseCoordinatesOptions = {},
): UseCoordinatesReturn {
  const actorRef = manager.actorRef;
  const coordinates = useSelector(actorRef, (state) => state.context.coordinates);
  const phase = useSelector(actorRef, (state) => state.context.phase);
  const authorizationState = useSelector(
    actorRef,
    (state) => state.context.authorizationState,
  );
  const isLoading = useSelector(actorRef, (state) => state.context.isLoading);
  const lastError = useSelector(actorRef, (state) => state.context.lastError);
  const errorMessage = useSelector(
    actorRef,
    (state) => state.context.errorMessage,
  );

  // The manager the mount request was issued for; StrictMode runs effects twice.
  const requestedForRef = useRef<CoordinateStateManager | null>(null);

  useEffect(() => {
    if (!requestOnMount || requestedForRef.current === manager) return;
    requestedForRef.current = manager;
    manager.requestLocation();
  }, [manager, requestOnMount]);

  const requestLocation = useCallback(() => {
    manager.requestLocation();
  }, [manager]);

  const applyManualEdit = useCallback(
    (latitudeText: string, longitudeText: string) =>
      manager.applyManualEdit(latitudeText, longitudeText),
    [manager],
  );

  const setMockLocation = useCallback(() => {
    manager.setMockLocation();
  }, [manager]);

  return {
    coordinates,
    phase,
    authorizationState,
    isLoading,
    lastError,
    errorMessage,
    requestLocation,
    applyManualEdit,
    setMockLocation,
  };
}
