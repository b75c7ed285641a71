import { assign, fromCallback, sendTo, setup } from "xstate";
import {
  createCoordinateValue,
  isValidLatitude,
  isValidLongitude,
  type CoordinateValue,
} from "../coordinates/coordinateValue";
import type { LocationError } from "../errors";
import { formatLocationError } from "../../utils/locationError";
import {
  resolveCoordinateSettings,
  resolveFallback,
  resolveLocationFailure,
} from "./fallbackPolicy";
import {
  AuthorizationState,
  normalizeAuthorizationState,
  type CoordinateSettings,
  type LocationProvider,
} from "./types";

export type CoordinatePhase =
  | "idle"
  | "awaitingAuthorization"
  | "awaitingFix"
  | "loaded"
  | "failed";

export type CoordinateMachineEvent =
  | { type: "REQUEST_LOCATION" }
  | { type: "LOCATION_RECEIVED"; latitude: number; longitude: number }
  | { type: "LOCATION_FAILED"; error: LocationError }
  | { type: "AUTHORIZATION_CHANGED"; state: AuthorizationState }
  | { type: "MANUAL_EDIT"; coordinates: CoordinateValue }
  | { type: "SET_MOCK_LOCATION" };

/** The provider request the machine is still owed an answer for. */
export type ProviderCall = "none" | "authorization" | "fix";

type ProviderBridgeEvent =
  | { type: "REQUEST_AUTHORIZATION" }
  | { type: "REQUEST_FIX" };

export interface CoordinateMachineInput {
  provider: LocationProvider;
  settings: CoordinateSettings;
}

export interface CoordinateMachineContext {
  provider: LocationProvider;
  settings: CoordinateSettings;
  phase: CoordinatePhase;
  coordinates: CoordinateValue;
  authorizationState: AuthorizationState;
  isLoading: boolean;
  lastError: LocationError | null;
  errorMessage: string | null;
  isInitialRequest: boolean;
  hasPendingAuthorizationRequest: boolean;
  providerCall: ProviderCall;
  /** The outstanding call was overtaken; its answer is dropped. */
  isProviderCallSuperseded: boolean;
}

// Every commit is a new object so subscribers see each one.
function commit(value: CoordinateValue): CoordinateValue {
  return createCoordinateValue(value.latitude, value.longitude);
}

function readAuthorization(
  context: CoordinateMachineContext,
): AuthorizationState {
  return normalizeAuthorizationState(context.provider.currentAuthorization());
}

function isRefusal(state: AuthorizationState): boolean {
  return (
    state === AuthorizationState.Denied ||
    state === AuthorizationState.Restricted
  );
}

function refuse(
  context: CoordinateMachineContext,
  error: LocationError,
): Partial<CoordinateMachineContext> {
  return {
    isLoading: false,
    hasPendingAuthorizationRequest: false,
    lastError: error,
    errorMessage: formatLocationError(error),
    coordinates: commit(resolveFallback(context.settings, "refused")),
  };
}

function fail(
  context: CoordinateMachineContext,
  error: LocationError,
): Partial<CoordinateMachineContext> {
  const outcome = resolveLocationFailure(
    error,
    context.isInitialRequest,
    context.settings,
  );
  return {
    isLoading: false,
    hasPendingAuthorizationRequest: false,
    isInitialRequest: false,
    lastError: error,
    errorMessage: outcome.errorMessage,
    coordinates: outcome.coordinates
      ? commit(outcome.coordinates)
      : context.coordinates,
  };
}

const settleProviderCall = {
  providerCall: "none",
  isProviderCallSuperseded: false,
} as const;

function supersedeProviderCall(
  context: CoordinateMachineContext,
): Partial<CoordinateMachineContext> {
  return context.providerCall === "none"
    ? {}
    : { isProviderCallSuperseded: true };
}

const UNKNOWN_AUTHORIZATION_ERROR: LocationError = {
  type: "UnknownAuthorization",
  message: "Unrecognized authorization status",
};

const startRequest = {
  isLoading: true,
  lastError: null,
  errorMessage: null,
} as const;

const providerBridge = fromCallback<
  ProviderBridgeEvent,
  { provider: LocationProvider }
>(({ sendBack, receive, input }) => {
  const unsubscribe = input.provider.subscribe({
    onLocationReceived: (latitude, longitude) => {
      sendBack({ type: "LOCATION_RECEIVED", latitude, longitude });
    },
    onLocationFailed: (error) => {
      sendBack({ type: "LOCATION_FAILED", error });
    },
    onAuthorizationChanged: (state) => {
      sendBack({
        type: "AUTHORIZATION_CHANGED",
        state: normalizeAuthorizationState(state),
      });
    },
  });

  receive((event) => {
    switch (event.type) {
      case "REQUEST_AUTHORIZATION":
        input.provider.requestAuthorization();
        break;
      case "REQUEST_FIX":
        input.provider.requestLocation();
        break;
    }
  });

  return unsubscribe;
});

export const coordinateMachine = setup({
  types: {
    context: {} as CoordinateMachineContext,
    events: {} as CoordinateMachineEvent,
    input: {} as CoordinateMachineInput,
  },
  actors: {
    providerBridge,
  },
  actions: {
    logFailure: ({ context }) => {
      if (context.lastError && context.errorMessage) {
        console.warn("Location request failed:", context.lastError.message);
      }
    },
  },
}).createMachine({
  id: "coordinates",
  initial: "idle",
  context: ({ input }) => ({
    provider: input.provider,
    settings: resolveCoordinateSettings(input.settings),
    phase: "idle",
    coordinates: createCoordinateValue(0, 0),
    authorizationState: normalizeAuthorizationState(
      input.provider.currentAuthorization(),
    ),
    isLoading: false,
    lastError: null,
    errorMessage: null,
    isInitialRequest: true,
    hasPendingAuthorizationRequest: false,
    providerCall: "none",
    isProviderCallSuperseded: false,
  }),
  invoke: {
    id: "providerBridge",
    src: "providerBridge",
    input: ({ context }) => ({ provider: context.provider }),
  },
  on: {
    REQUEST_LOCATION: [
      {
        // One provider request at a time; repeats are dropped.
        guard: ({ context }) =>
          context.isLoading || context.providerCall !== "none",
      },
      {
        guard: ({ context }) => !context.provider.isServiceAvailable(),
        target: "#failed",
        actions: [
          assign(({ context }) =>
            refuse(context, {
              type: "ServiceUnavailable",
              message: "Location services are disabled",
            }),
          ),
          "logFailure",
        ],
      },
      {
        guard: ({ context }) =>
          readAuthorization(context) === AuthorizationState.Undetermined,
        target: "#awaitingAuthorization",
        actions: [
          assign({
            ...startRequest,
            authorizationState: AuthorizationState.Undetermined,
            hasPendingAuthorizationRequest: true,
            providerCall: "authorization",
          }),
          sendTo("providerBridge", { type: "REQUEST_AUTHORIZATION" }),
        ],
      },
      {
        guard: ({ context }) =>
          readAuthorization(context) === AuthorizationState.Granted,
        target: "#awaitingFix",
        actions: [
          assign({
            ...startRequest,
            authorizationState: AuthorizationState.Granted,
            providerCall: "fix",
          }),
          sendTo("providerBridge", { type: "REQUEST_FIX" }),
        ],
      },
      {
        guard: ({ context }) => isRefusal(readAuthorization(context)),
        target: "#failed",
        actions: [
          assign(({ context }) => ({
            ...refuse(context, {
              type: "PermissionDenied",
              message: "Location access is denied or restricted",
            }),
            authorizationState: readAuthorization(context),
          })),
          "logFailure",
        ],
      },
      {
        target: "#failed",
        actions: [
          assign(({ context }) => ({
            ...refuse(context, UNKNOWN_AUTHORIZATION_ERROR),
            authorizationState: AuthorizationState.Unknown,
          })),
          "logFailure",
        ],
      },
    ],
    LOCATION_RECEIVED: [
      {
        guard: ({ context }) => context.isProviderCallSuperseded,
        actions: assign(settleProviderCall),
      },
      {
        guard: ({ event }) =>
          isValidLatitude(event.latitude) && isValidLongitude(event.longitude),
        target: "#loaded",
        actions: assign(({ event }) => ({
          ...settleProviderCall,
          isLoading: false,
          lastError: null,
          errorMessage: null,
          coordinates: createCoordinateValue(event.latitude, event.longitude),
        })),
      },
      {
        target: "#failed",
        actions: [
          assign(({ context, event }) => ({
            ...fail(context, {
              type: "InvalidFix",
              message: `Received out-of-range coordinates (${event.latitude}, ${event.longitude})`,
            }),
            ...settleProviderCall,
          })),
          "logFailure",
        ],
      },
    ],
    LOCATION_FAILED: [
      {
        guard: ({ context }) => context.isProviderCallSuperseded,
        actions: assign(settleProviderCall),
      },
      {
        target: "#failed",
        actions: [
          assign(({ context, event }) => ({
            ...fail(context, event.error),
            ...settleProviderCall,
          })),
          "logFailure",
        ],
      },
    ],
    AUTHORIZATION_CHANGED: [
      {
        guard: ({ context, event }) =>
          context.isProviderCallSuperseded &&
          context.providerCall === "authorization" &&
          event.state !== AuthorizationState.Undetermined,
        actions: assign(({ event }) => ({
          ...settleProviderCall,
          authorizationState: event.state,
          isInitialRequest: false,
        })),
      },
      {
        guard: ({ context, event }) =>
          event.state === AuthorizationState.Granted &&
          context.hasPendingAuthorizationRequest,
        target: "#awaitingFix",
        actions: [
          assign(({ event }) => ({
            authorizationState: event.state,
            isInitialRequest: false,
            hasPendingAuthorizationRequest: false,
            providerCall: "fix",
            lastError: null,
            errorMessage: null,
          })),
          sendTo("providerBridge", { type: "REQUEST_FIX" }),
        ],
      },
      {
        guard: ({ context, event }) =>
          isRefusal(event.state) && context.hasPendingAuthorizationRequest,
        target: "#failed",
        actions: [
          assign(({ context, event }) => ({
            ...refuse(context, {
              type: "PermissionDenied",
              message: "Location authorization was refused",
            }),
            ...settleProviderCall,
            authorizationState: event.state,
            isInitialRequest: false,
          })),
          "logFailure",
        ],
      },
      {
        // Revoked while a fix is outstanding; the provider still answers it.
        guard: ({ event }) => isRefusal(event.state),
        actions: assign(({ event }) => ({
          authorizationState: event.state,
          isInitialRequest: false,
          isLoading: false,
        })),
      },
      {
        guard: ({ context, event }) =>
          event.state === AuthorizationState.Unknown && context.isLoading,
        target: "#failed",
        actions: [
          assign(({ context }) => ({
            ...(context.providerCall === "authorization"
              ? settleProviderCall
              : supersedeProviderCall(context)),
            authorizationState: AuthorizationState.Unknown,
            isInitialRequest: false,
            isLoading: false,
            hasPendingAuthorizationRequest: false,
            lastError: UNKNOWN_AUTHORIZATION_ERROR,
            errorMessage: formatLocationError(UNKNOWN_AUTHORIZATION_ERROR),
          })),
          "logFailure",
        ],
      },
      {
        guard: ({ event }) => event.state === AuthorizationState.Unknown,
        actions: assign({
          authorizationState: AuthorizationState.Unknown,
          isInitialRequest: false,
          errorMessage: formatLocationError(UNKNOWN_AUTHORIZATION_ERROR),
        }),
      },
      {
        actions: assign(({ event }) => ({
          authorizationState: event.state,
          isInitialRequest: false,
        })),
      },
    ],
    MANUAL_EDIT: {
      actions: assign(({ event }) => ({
        coordinates: event.coordinates,
        lastError: null,
        errorMessage: null,
      })),
    },
    SET_MOCK_LOCATION: {
      target: "#loaded",
      actions: assign(({ context }) => ({
        ...supersedeProviderCall(context),
        coordinates: commit(context.settings.mockCoordinates),
        isLoading: false,
        hasPendingAuthorizationRequest: false,
        lastError: null,
        errorMessage: null,
      })),
    },
  },
  states: {
    idle: {
      id: "idle",
      entry: assign({ phase: "idle" }),
    },
    awaitingAuthorization: {
      id: "awaitingAuthorization",
      entry: assign({ phase: "awaitingAuthorization" }),
    },
    awaitingFix: {
      id: "awaitingFix",
      entry: assign({ phase: "awaitingFix" }),
    },
    loaded: {
      id: "loaded",
      entry: assign({ phase: "loaded" }),
    },
    failed: {
      id: "failed",
      entry: assign({ phase: "failed" }),
    },
  },
});
