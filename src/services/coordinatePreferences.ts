import { DEFAULT_COORDINATE_SETTINGS, MOCK_FALLBACK_KEY } from "../utils/constants";
import type { CoordinateSettings } from "../domain/location/types";

export function getMockFallbackPreference(): boolean {
  if (typeof window === "undefined") {
    return DEFAULT_COORDINATE_SETTINGS.useMockFallback;
  }
  const stored = localStorage.getItem(MOCK_FALLBACK_KEY);
  if (stored === null) return DEFAULT_COORDINATE_SETTINGS.useMockFallback;
  return stored === "true";
}

export function setMockFallbackPreference(enabled: boolean): void {
  if (typeof window === "undefined") return;
  try {
    localStorage.setItem(MOCK_FALLBACK_KEY, String(enabled));
  } catch (error) {
    console.error("Failed to store mock fallback preference:", error);
  }
}

export function loadCoordinateSettings(
  overrides: Partial<CoordinateSettings> = {},
): CoordinateSettings {
  return {
    ...DEFAULT_COORDINATE_SETTINGS,
    useMockFallback: getMockFallbackPreference(),
    ...overrides,
  };
}
