export type CoordinateField = "latitude" | "longitude";

export interface CoordinateBounds {
  min: number;
  max: number;
}

export type CoordinateValidationError =
  | { type: "NotANumber"; field: CoordinateField; message: string }
  | {
      type: "OutOfRange";
      field: CoordinateField;
      bounds: CoordinateBounds;
      message: string;
    };

export type LocationError =
  | { type: "ServiceUnavailable"; message: string }
  | { type: "PermissionDenied"; message: string }
  | { type: "Network"; message: string }
  | { type: "PositionUnavailable"; message: string }
  | { type: "Timeout"; message: string }
  | { type: "InvalidFix"; message: string }
  | { type: "UnknownAuthorization"; message: string }
  | { type: "Unknown"; message: string };
