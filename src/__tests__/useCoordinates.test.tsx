import { act, renderHook } from "@testing-library/react";
import { useCoordinates } from "../hooks/useCoordinates";
import { CoordinateStateManager } from "../domain/location/coordinateStateManager";
import { AuthorizationState } from "../domain/location/types";
import { FakeLocationProvider } from "./helpers/fakeLocationProvider";

describe("useCoordinates", () => {
  it("issues one request on mount", () => {
    const provider = new FakeLocationProvider();
    const manager = new CoordinateStateManager(provider);

    const { result, rerender } = renderHook(() =>
      useCoordinates(manager, { requestOnMount: true }),
    );
    rerender();

    expect(provider.requestAuthorization).toHaveBeenCalledTimes(1);
    expect(result.current.isLoading).toBe(true);
    expect(result.current.phase).toBe("awaitingAuthorization");
    manager.stop();
  });

  it("issues the mount request for a replacement manager", () => {
    const firstProvider = new FakeLocationProvider();
    const secondProvider = new FakeLocationProvider();
    const first = new CoordinateStateManager(firstProvider);
    const second = new CoordinateStateManager(secondProvider);

    const { rerender } = renderHook(
      ({ manager }) => useCoordinates(manager, { requestOnMount: true }),
      { initialProps: { manager: first } },
    );
    rerender({ manager: second });
    rerender({ manager: second });

    expect(firstProvider.requestAuthorization).toHaveBeenCalledTimes(1);
    expect(secondProvider.requestAuthorization).toHaveBeenCalledTimes(1);
    first.stop();
    second.stop();
  });

  it("does not request without the option", () => {
    const provider = new FakeLocationProvider();
    const manager = new CoordinateStateManager(provider);

    renderHook(() => useCoordinates(manager));

    expect(provider.requestAuthorization).not.toHaveBeenCalled();
    manager.stop();
  });

  it("follows the provider through to a fix", () => {
    const provider = new FakeLocationProvider();
    const manager = new CoordinateStateManager(provider);
    const { result } = renderHook(() => useCoordinates(manager));

    act(() => {
      result.current.requestLocation();
    });
    act(() => {
      provider.emitAuthorization(AuthorizationState.Granted);
    });

    expect(result.current.authorizationState).toBe(AuthorizationState.Granted);
    expect(result.current.phase).toBe("awaitingFix");

    act(() => {
      provider.emitLocation(48.8566, 2.3522);
    });

    expect(result.current.coordinates).toEqual({
      latitude: 48.8566,
      longitude: 2.3522,
    });
    expect(result.current.isLoading).toBe(false);
    expect(result.current.errorMessage).toBeNull();
    manager.stop();
  });

  it("exposes refusal messages", () => {
    const provider = new FakeLocationProvider(AuthorizationState.Denied);
    const manager = new CoordinateStateManager(provider);
    const consoleWarn = jest
      .spyOn(console, "warn")
      .mockImplementation(() => {});
    const { result } = renderHook(() => useCoordinates(manager));

    act(() => {
      result.current.requestLocation();
    });

    expect(result.current.errorMessage).toBe(
      "Location access denied. Please enable in Settings.",
    );
    expect(result.current.lastError?.type).toBe("PermissionDenied");

    act(() => {
      result.current.setMockLocation();
    });

    expect(result.current.errorMessage).toBeNull();
    expect(result.current.coordinates).toEqual({
      latitude: 37.7749,
      longitude: -122.4194,
    });
    consoleWarn.mockRestore();
    manager.stop();
  });

  it("returns validation errors from manual edits", () => {
    const provider = new FakeLocationProvider();
    const manager = new CoordinateStateManager(provider);
    const { result } = renderHook(() => useCoordinates(manager));

    let outcome: ReturnType<typeof result.current.applyManualEdit> | undefined;
    act(() => {
      outcome = result.current.applyManualEdit("12", "north");
    });

    expect(outcome).toEqual({
      ok: false,
      error: {
        type: "NotANumber",
        field: "longitude",
        message: "Please enter a valid number",
      },
    });
    expect(result.current.coordinates).toEqual({ latitude: 0, longitude: 0 });
    manager.stop();
  });
});
