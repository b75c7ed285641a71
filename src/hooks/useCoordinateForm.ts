import { useCallback, useEffect, useState } from "react";
import {
  formattedLatitude,
  formattedLongitude,
  type CoordinateValue,
} from "../domain/coordinates/coordinateValue";
import { validateCoordinateField } from "../domain/coordinates/validation";
import type { CoordinateField, CoordinateValidationError } from "../domain/errors";
import type { CoordinateStateManager } from "../domain/location/coordinateStateManager";
import type { Result } from "../domain/result";

function fieldError(text: string, field: CoordinateField): string | null {
  const result = validateCoordinateField(text, field);
  return result.ok ? null : result.error.message;
}

export interface UseCoordinateFormReturn {
  latitudeText: string;
  longitudeText: string;
  latitudeError: string | null;
  longitudeError: string | null;
  canSubmit: boolean;
  setLatitudeText: (text: string) => void;
  setLongitudeText: (text: string) => void;
  submit: () => Result<CoordinateValue, CoordinateValidationError>;
}

/**
 * Edit-field state for the coordinate form. Fields are re-seeded with the
 * formatted value whenever new coordinates are committed.
 */
export function useCoordinateForm(
  manager: CoordinateStateManager,
): UseCoordinateFormReturn {
  const [latitudeText, setLatitudeValue] = useState(() =>
    formattedLatitude(manager.currentCoordinates),
  );
  const [longitudeText, setLongitudeValue] = useState(() =>
    formattedLongitude(manager.currentCoordinates),
  );
  const [latitudeError, setLatitudeError] = useState<string | null>(null);
  const [longitudeError, setLongitudeError] = useState<string | null>(null);

  useEffect(
    () =>
      manager.observe("coordinates", (coordinates) => {
        setLatitudeValue(formattedLatitude(coordinates));
        setLongitudeValue(formattedLongitude(coordinates));
        setLatitudeError(null);
        setLongitudeError(null);
      }),
    [manager],
  );

  const setLatitudeText = useCallback((text: string) => {
    setLatitudeValue(text);
    setLatitudeError(fieldError(text, "latitude"));
  }, []);

  const setLongitudeText = useCallback((text: string) => {
    setLongitudeValue(text);
    setLongitudeError(fieldError(text, "longitude"));
  }, []);

  const submit = useCallback(() => {
    const result = manager.applyManualEdit(latitudeText, longitudeText);
    if (!result.ok) {
      setLatitudeError(fieldError(latitudeText, "latitude"));
      setLongitudeError(fieldError(longitudeText, "longitude"));
    }
    return result;
  }, [manager, latitudeText, longitudeText]);

  return {
    latitudeText,
    longitudeText,
    latitudeError,
    longitudeError,
    canSubmit: latitudeError === null && longitudeError === null,
    setLatitudeText,
    setLongitudeText,
    submit,
  };
}
