/**
 * Configuration constants for the face capture client
 */
import { ConfigurationError } from "../utils/errors";

// Live stream
export const STREAM_INTERVAL_MS = 1000;

// Suffix appended to a capture's base name for its face crop
export const CROPPED_SUFFIX = "_cropped.jpg";

// Remote recognition backend
export const RECOGNITION_ENDPOINTS = {
  START_STREAM: "/start_stream",
  MAIN: "/main",
} as const;

// RetinaFace Detection Parameters
export const RETINAFACE = {
  CONFIDENCE_THRESHOLD: 0.02, // Initial detection threshold before filtering
  NMS_THRESHOLD: 0.4,         // Non-Maximum Suppression threshold
  TOP_K: 5000,                // Maximum detections to keep before NMS
  KEEP_TOP_K: 750,            // Maximum detections to keep after NMS
  MEAN_BGR: [104, 117, 123],
} as const;

// Upload limits for camera frames
export const UPLOAD_LIMITS = {
  FILE_SIZE: 10 * 1024 * 1024, // 10MB
  MIME_TYPES: ["image/jpeg", "image/jpg", "image/png", "image/webp"],
} as const;

// Recent detections remembered for annotated previews
export const DETECTION_LOG_SIZE = 100;

export const DEFAULTS = {
  PORT: 3000,
  CAPTURE_DIR: "/tmp/face-capture",
  FACE_MODEL_PATH: "./models/retinaface_mobile0.25.onnx",
  DETECTION_THRESHOLD: 0.6,
  REQUEST_TIMEOUT_MS: 10000,
} as const;

/**
 * Base URL of the recognition backend.
 * Missing configuration only disables recognition, so callers hit this per request.
 */
export const getApiUrl = (): string => {
  const apiUrl = process.env.API_URL?.trim();
  if (!apiUrl) {
    throw new ConfigurationError("API_URL is not configured");
  }
  return apiUrl.replace(/\/+$/, "");
};

export const isApiUrlConfigured = (): boolean => Boolean(process.env.API_URL?.trim());

export const getPort = (): number => {
  return parseInt(process.env.PORT || String(DEFAULTS.PORT), 10);
};

export const getCaptureDir = (): string => {
  return process.env.CAPTURE_DIR || DEFAULTS.CAPTURE_DIR;
};

export const getGalleryDir = (): string => {
  return process.env.GALLERY_DIR || process.cwd();
};

export const getFaceModelPath = (): string => {
  return process.env.FACE_MODEL_PATH || DEFAULTS.FACE_MODEL_PATH;
};

/**
 * Get detection threshold from environment or use default
 */
export const getDetectionThreshold = (): number => {
  return parseFloat(
    process.env.FACE_DETECTION_THRESHOLD || String(DEFAULTS.DETECTION_THRESHOLD)
  );
};

export const getRequestTimeoutMs = (): number => {
  return parseInt(process.env.REQUEST_TIMEOUT_MS || String(DEFAULTS.REQUEST_TIMEOUT_MS), 10);
};
