import { createActor, type Actor, type SnapshotFrom } from "xstate";
import type { CoordinateValue } from "../coordinates/coordinateValue";
import { validateCoordinateInput } from "../coordinates/validation";
import type { CoordinateValidationError, LocationError } from "../errors";
import type { Result } from "../result";
import { DEFAULT_COORDINATE_SETTINGS } from "../../utils/constants";
import {
  coordinateMachine,
  type CoordinatePhase,
} from "./coordinateMachine";
import {
  normalizeAuthorizationState,
  type AuthorizationState,
  type CoordinateSettings,
  type LocationProvider,
  type LocationProviderListener,
} from "./types";

export interface CoordinateState {
  phase: CoordinatePhase;
  coordinates: CoordinateValue;
  authorizationState: AuthorizationState;
  isLoading: boolean;
  lastError: LocationError | null;
  errorMessage: string | null;
}

export type CoordinateStateListener = (state: CoordinateState) => void;

export type CoordinateActor = Actor<typeof coordinateMachine>;

export function toCoordinateState(
  snapshot: SnapshotFrom<typeof coordinateMachine>,
): CoordinateState {
  const { context } = snapshot;
  return {
    phase: context.phase,
    coordinates: context.coordinates,
    authorizationState: context.authorizationState,
    isLoading: context.isLoading,
    lastError: context.lastError,
    errorMessage: context.errorMessage,
  };
}

/**
 * Single owner of the current coordinates. Public calls and provider callbacks
 * all become events on one actor, which processes them in order.
 *
 * The provider reaches the manager through `provider.subscribe`; the listener
 * methods on this class deliver the same events for hosts that call back
 * directly.
 */
export class CoordinateStateManager implements LocationProviderListener {
  private readonly actor: CoordinateActor;

  constructor(
    provider: LocationProvider,
    settings: CoordinateSettings = DEFAULT_COORDINATE_SETTINGS,
  ) {
    this.actor = createActor(coordinateMachine, {
      input: { provider, settings },
    });
    this.actor.start();
  }

  get actorRef(): CoordinateActor {
    return this.actor;
  }

  getState(): CoordinateState {
    return toCoordinateState(this.actor.getSnapshot());
  }

  get currentCoordinates(): CoordinateValue {
    return this.getState().coordinates;
  }

  get authorizationState(): AuthorizationState {
    return this.getState().authorizationState;
  }

  get isLoading(): boolean {
    return this.getState().isLoading;
  }

  get lastError(): LocationError | null {
    return this.getState().lastError;
  }

  get userFacingErrorMessage(): string | null {
    return this.getState().errorMessage;
  }

  get phase(): CoordinatePhase {
    return this.getState().phase;
  }

  requestLocation(): void {
    this.actor.send({ type: "REQUEST_LOCATION" });
  }

  /**
   * Validates both fields and commits on success. Independent of any
   * outstanding location request.
   */
  applyManualEdit(
    latitudeText: string,
    longitudeText: string,
  ): Result<CoordinateValue, CoordinateValidationError> {
    const result = validateCoordinateInput(latitudeText, longitudeText);
    if (result.ok) {
      this.actor.send({ type: "MANUAL_EDIT", coordinates: result.value });
    }
    return result;
  }

  setMockLocation(): void {
    this.actor.send({ type: "SET_MOCK_LOCATION" });
  }

  onLocationReceived(latitude: number, longitude: number): void {
    this.actor.send({ type: "LOCATION_RECEIVED", latitude, longitude });
  }

  onLocationFailed(error: LocationError): void {
    this.actor.send({ type: "LOCATION_FAILED", error });
  }

  onAuthorizationChanged(state: AuthorizationState): void {
    this.actor.send({
      type: "AUTHORIZATION_CHANGED",
      state: normalizeAuthorizationState(state),
    });
  }

  /** Called after every processed event. */
  subscribe(listener: CoordinateStateListener): () => void {
    const subscription = this.actor.subscribe((snapshot) => {
      listener(toCoordinateState(snapshot));
    });
    return () => subscription.unsubscribe();
  }

  /** Emits one field whenever it changes. */
  observe<K extends keyof CoordinateState>(
    key: K,
    listener: (value: CoordinateState[K]) => void,
  ): () => void {
    let previous = this.getState()[key];
    return this.subscribe((state) => {
      const next = state[key];
      if (Object.is(next, previous)) return;
      previous = next;
      listener(next);
    });
  }

  stop(): void {
    this.actor.stop();
  }
}
