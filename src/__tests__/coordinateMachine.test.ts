import { createActor } from "xstate";
import { coordinateMachine } from "../domain/location/coordinateMachine";
import { AuthorizationState } from "../domain/location/types";
import { DEFAULT_COORDINATE_SETTINGS } from "../utils/constants";
import { FakeLocationProvider } from "./helpers/fakeLocationProvider";

function startActor(provider: FakeLocationProvider) {
  const actor = createActor(coordinateMachine, {
    input: { provider, settings: DEFAULT_COORDINATE_SETTINGS },
  });
  actor.start();
  return actor;
}

describe("coordinateMachine", () => {
  it("starts idle with default coordinates", () => {
    const provider = new FakeLocationProvider(AuthorizationState.Restricted);
    const actor = startActor(provider);

    expect(actor.getSnapshot().value).toBe("idle");
    expect(actor.getSnapshot().context).toMatchObject({
      phase: "idle",
      coordinates: { latitude: 0, longitude: 0 },
      authorizationState: AuthorizationState.Restricted,
      isLoading: false,
      isInitialRequest: true,
      hasPendingAuthorizationRequest: false,
    });
    actor.stop();
  });

  it("tracks a pending authorization request until it resolves", () => {
    const provider = new FakeLocationProvider();
    const actor = startActor(provider);

    actor.send({ type: "REQUEST_LOCATION" });

    expect(actor.getSnapshot().value).toBe("awaitingAuthorization");
    expect(actor.getSnapshot().context.hasPendingAuthorizationRequest).toBe(
      true,
    );

    actor.send({
      type: "AUTHORIZATION_CHANGED",
      state: AuthorizationState.Granted,
    });

    expect(actor.getSnapshot().value).toBe("awaitingFix");
    expect(actor.getSnapshot().context).toMatchObject({
      phase: "awaitingFix",
      hasPendingAuthorizationRequest: false,
      isInitialRequest: false,
      isLoading: true,
    });
    actor.stop();
  });

  it("keeps an overtaken fetch outstanding until the provider answers", () => {
    const provider = new FakeLocationProvider(AuthorizationState.Granted);
    const actor = startActor(provider);

    actor.send({ type: "REQUEST_LOCATION" });
    expect(actor.getSnapshot().context.providerCall).toBe("fix");

    actor.send({ type: "SET_MOCK_LOCATION" });
    expect(actor.getSnapshot().context).toMatchObject({
      phase: "loaded",
      isLoading: false,
      providerCall: "fix",
      isProviderCallSuperseded: true,
    });

    actor.send({ type: "LOCATION_RECEIVED", latitude: 1, longitude: 2 });
    expect(actor.getSnapshot().context).toMatchObject({
      coordinates: { latitude: 37.7749, longitude: -122.4194 },
      providerCall: "none",
      isProviderCallSuperseded: false,
    });
    actor.stop();
  });

  it("keeps the initial-request flag through a successful fix", () => {
    const provider = new FakeLocationProvider(AuthorizationState.Granted);
    const actor = startActor(provider);

    actor.send({ type: "REQUEST_LOCATION" });
    actor.send({ type: "LOCATION_RECEIVED", latitude: 1, longitude: 2 });

    expect(actor.getSnapshot().value).toBe("loaded");
    expect(actor.getSnapshot().context.isInitialRequest).toBe(true);
    actor.stop();
  });

  it("clears the initial-request flag after the first failure", () => {
    const provider = new FakeLocationProvider(AuthorizationState.Granted);
    const actor = startActor(provider);

    actor.send({ type: "REQUEST_LOCATION" });
    actor.send({
      type: "LOCATION_FAILED",
      error: { type: "Network", message: "offline" },
    });

    expect(actor.getSnapshot().value).toBe("failed");
    expect(actor.getSnapshot().context).toMatchObject({
      isInitialRequest: false,
      isLoading: false,
      errorMessage: null,
      lastError: { type: "Network", message: "offline" },
    });
    actor.stop();
  });

  it("does not change phase on a manual edit", () => {
    const provider = new FakeLocationProvider();
    const actor = startActor(provider);

    actor.send({ type: "REQUEST_LOCATION" });
    actor.send({
      type: "MANUAL_EDIT",
      coordinates: { latitude: 5, longitude: 6 },
    });

    expect(actor.getSnapshot().value).toBe("awaitingAuthorization");
    expect(actor.getSnapshot().context.coordinates).toEqual({
      latitude: 5,
      longitude: 6,
    });
    actor.stop();
  });
});
