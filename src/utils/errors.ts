/**
 * Error classes for the capture pipeline.
 * Every pipeline failure ends the current run; none is retried.
 */

export class NoSelectionError extends Error {
  public readonly code = "NO_SELECTION";

  constructor(message = "no_image_selected") {
    super(message);
    this.name = "NoSelectionError";
  }
}

export class DecodeError extends Error {
  public readonly code = "DECODE_FAILED";

  constructor(message = "image_unreadable") {
    super(message);
    this.name = "DecodeError";
  }
}

export class NoFaceDetectedError extends Error {
  public readonly code = "NO_FACE";

  constructor(message = "no_face_detected") {
    super(message);
    this.name = "NoFaceDetectedError";
  }
}

export class ConfigurationError extends Error {
  public readonly code = "CONFIG_MISSING";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class TransportError extends Error {
  public readonly code = "TRANSPORT_FAILED";

  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = "TransportError";
  }
}

const hasCode = (err: unknown, code: string): boolean =>
  Boolean(err && typeof err === "object" && "code" in err && err.code === code);

/**
 * Type guard to check if an error is a NoFaceDetectedError
 */
export const isNoFaceError = (err: unknown): boolean =>
  err instanceof NoFaceDetectedError || hasCode(err, "NO_FACE");

export const isNoSelectionError = (err: unknown): boolean =>
  err instanceof NoSelectionError || hasCode(err, "NO_SELECTION");

export const isDecodeError = (err: unknown): boolean =>
  err instanceof DecodeError || hasCode(err, "DECODE_FAILED");

export const isConfigurationError = (err: unknown): boolean =>
  err instanceof ConfigurationError || hasCode(err, "CONFIG_MISSING");

export const isTransportError = (err: unknown): boolean =>
  err instanceof TransportError || hasCode(err, "TRANSPORT_FAILED");

/**
 * Get error message from unknown error type
 */
export const getErrorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "unknown error";
};

export interface Dialog {
  title: string;
  message: string;
}

/**
 * Title and message shown to the user for a failed pipeline run
 */
export const toDialog = (err: unknown): Dialog => {
  if (isNoSelectionError(err)) {
    return { title: "Cancelled", message: "No image was selected." };
  }
  if (isNoFaceError(err)) {
    return {
      title: "No face detected",
      message: "No face was found in the image. Try another photo.",
    };
  }
  if (isDecodeError(err)) {
    return { title: "Unreadable image", message: getErrorMessage(err) };
  }
  if (isConfigurationError(err)) {
    return { title: "Configuration error", message: getErrorMessage(err) };
  }
  if (isTransportError(err)) {
    return { title: "Recognition failed", message: getErrorMessage(err) };
  }
  return { title: "Error", message: getErrorMessage(err) };
};
