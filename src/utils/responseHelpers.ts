import { Response } from "express";
import multer from "multer";
import {
  getErrorMessage,
  isConfigurationError,
  isDecodeError,
  isNoFaceError,
  isNoSelectionError,
  isTransportError,
  toDialog,
} from "./errors";

/**
 * 4xx status carried by an http-errors style error (body-parser, express)
 */
const clientErrorStatus = (err: unknown): number | null => {
  if (!err || typeof err !== "object") return null;
  const status =
    "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
  if (typeof status === "number" && status >= 400 && status < 500) return status;
  return null;
};

/**
 * HTTP status for a pipeline failure
 */
export const statusForError = (err: unknown): number => {
  if (err instanceof multer.MulterError) return 400;
  if (isNoFaceError(err) || isDecodeError(err) || isNoSelectionError(err)) return 400;
  if (isConfigurationError(err)) return 503;
  if (isTransportError(err)) return 502;
  return clientErrorStatus(err) ?? 500;
};

const errorCode = (err: unknown): string => {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  if (clientErrorStatus(err) !== null) return "INVALID_REQUEST";
  return "INTERNAL";
};

/**
 * Send a failure as the dialog the front end shows: `{ error, title, message }`
 */
export const sendErrorResponse = (res: Response, err: unknown): void => {
  const status = statusForError(err);

  if (status >= 500) {
    console.error(err);
  }

  let dialog = toDialog(err);
  if (err instanceof multer.MulterError) {
    dialog = { title: "Upload rejected", message: getErrorMessage(err) };
  } else if (clientErrorStatus(err) !== null) {
    dialog = { title: "Bad request", message: getErrorMessage(err) };
  } else if (status === 500 && process.env.NODE_ENV !== "development") {
    dialog = { title: "Error", message: "internal error" };
  }

  res.status(status).json({ error: errorCode(err), ...dialog });
};
