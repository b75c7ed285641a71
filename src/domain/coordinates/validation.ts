import type { CoordinateField, CoordinateValidationError } from "../errors";
import { err, ok, type Result } from "../result";
import {
  LATITUDE_BOUNDS,
  LONGITUDE_BOUNDS,
  createCoordinateValue,
  isValidLatitude,
  isValidLongitude,
  type CoordinateValue,
} from "./coordinateValue";

// Plain decimal notation only: no separators, no Infinity/NaN, no hex.
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const FIELD_LABELS: Record<CoordinateField, string> = {
  latitude: "Latitude",
  longitude: "Longitude",
};

function notANumber(field: CoordinateField): CoordinateValidationError {
  return { type: "NotANumber", field, message: "Please enter a valid number" };
}

function outOfRange(field: CoordinateField): CoordinateValidationError {
  const bounds = field === "latitude" ? LATITUDE_BOUNDS : LONGITUDE_BOUNDS;
  return {
    type: "OutOfRange",
    field,
    bounds,
    message: `${FIELD_LABELS[field]} must be between ${bounds.min} and ${bounds.max}`,
  };
}

export function parseCoordinateText(
  text: string,
  field: CoordinateField,
): Result<number, CoordinateValidationError> {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return err(notANumber(field));
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    return err(notANumber(field));
  }
  return ok(value);
}

export function checkCoordinateRange(
  value: number,
  field: CoordinateField,
): Result<number, CoordinateValidationError> {
  const valid =
    field === "latitude" ? isValidLatitude(value) : isValidLongitude(value);
  return valid ? ok(value) : err(outOfRange(field));
}

export function validateCoordinateField(
  text: string,
  field: CoordinateField,
): Result<number, CoordinateValidationError> {
  const parsed = parseCoordinateText(text, field);
  if (!parsed.ok) {
    return parsed;
  }
  return checkCoordinateRange(parsed.value, field);
}

export function validateCoordinateInput(
  latitudeText: string,
  longitudeText: string,
): Result<CoordinateValue, CoordinateValidationError> {
  const latitude = validateCoordinateField(latitudeText, "latitude");
  if (!latitude.ok) {
    return latitude;
  }
  const longitude = validateCoordinateField(longitudeText, "longitude");
  if (!longitude.ok) {
    return longitude;
  }
  return ok(createCoordinateValue(latitude.value, longitude.value));
}
