/**
 * Shared type definitions for the capture pipeline
 */
import type { JimpImage } from "../utils/imageUtils";

export type ImageSource = "camera" | "gallery";

/**
 * Face rectangle in pixel coordinates of the image it was detected in
 */
export interface FaceBoundingBox {
  Left: number;
  Top: number;
  Width: number;
  Height: number;
}

/**
 * Decoded image backed by a file on disk
 */
export interface CapturedImage {
  path: string;
  width: number;
  height: number;
  image: JimpImage;
}

/**
 * Image ready for transmission: orientation baked, optionally cropped to a face
 */
export interface NormalizedImage {
  path: string;
  width: number;
  height: number;
  cropped: boolean;
}

export interface DetectAndCropResult {
  image: NormalizedImage;
  box: FaceBoundingBox | null;
}

export interface RecognitionMatch {
  name?: string;
  message?: string;
  distance?: number;
}

/**
 * Reply of the recognition backend. `text` is the body verbatim;
 * `match` is set when the body is a JSON object of the known shape.
 */
export interface RecognitionResult {
  text: string;
  match: RecognitionMatch | null;
}

export interface StartStreamResult {
  message?: string;
}

/**
 * Detects faces; boxes come back in the detector's own order
 */
export interface FaceLocator {
  locate(image: CapturedImage): Promise<FaceBoundingBox[]>;
}

export interface RecognitionTransport {
  startStream(): Promise<StartStreamResult>;
  recognize(bytes: Buffer): Promise<RecognitionResult>;
}

/**
 * Resolves a source to an image path on disk, or null when the user cancelled
 */
export interface ImagePicker {
  pickImage(source: ImageSource): Promise<string | null>;
}

export interface CameraSession {
  open(): Promise<void>;
  /** Path of a freshly captured frame, or null when no frame is available */
  captureFrame(): Promise<string | null>;
  release(): Promise<void>;
}

export type PipelineState = "idle" | "capturing" | "detecting" | "submitting";
