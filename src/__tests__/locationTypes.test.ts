import {
  AuthorizationState,
  isAuthorizationState,
  normalizeAuthorizationState,
} from "../domain/location/types";
import {
  LOCATION_DISABLED_MESSAGE,
  UNKNOWN_AUTHORIZATION_MESSAGE,
  formatLocationError,
} from "../utils/locationError";

describe("authorization state", () => {
  it("recognizes the known states", () => {
    expect(isAuthorizationState("restricted")).toBe(true);
    expect(isAuthorizationState("authorizedAlways")).toBe(false);
  });

  it("maps unrecognized states to unknown", () => {
    expect(normalizeAuthorizationState("granted")).toBe(
      AuthorizationState.Granted,
    );
    expect(normalizeAuthorizationState("authorizedAlways")).toBe(
      AuthorizationState.Unknown,
    );
  });
});

describe("formatLocationError", () => {
  it("uses fixed messages for service and status errors", () => {
    expect(
      formatLocationError({ type: "ServiceUnavailable", message: "off" }),
    ).toBe(LOCATION_DISABLED_MESSAGE);
    expect(
      formatLocationError({ type: "UnknownAuthorization", message: "?" }),
    ).toBe(UNKNOWN_AUTHORIZATION_MESSAGE);
  });

  it("includes the description of generic errors", () => {
    expect(formatLocationError({ type: "Unknown", message: "boom" })).toBe(
      "Error getting location: boom",
    );
  });
});
