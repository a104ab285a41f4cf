import path from "path";
import { DETECTION_LOG_SIZE, getCaptureDir, getGalleryDir } from "./config/constants";
import { CameraStream } from "./services/cameraStream";
import { discardCapture } from "./services/captureNormalizer";
import { DetectionLog } from "./services/detectionLog";
import { FrameBufferCamera } from "./services/frameCamera";
import type { FaceLocator, RecognitionTransport } from "./types/face";

/**
 * Everything the HTTP layer needs; built once at startup, swapped for fakes in tests
 */
export interface AppContext {
  locator: FaceLocator;
  transport: RecognitionTransport;
  camera: FrameBufferCamera;
  stream: CameraStream;
  detections: DetectionLog;
  captureDir: string;
  galleryDir: string;
}

interface CreateContextOptions {
  locator: FaceLocator;
  transport: RecognitionTransport;
  captureDir?: string;
  galleryDir?: string;
  streamIntervalMs?: number;
  detectionLogSize?: number;
}

export const createContext = (options: CreateContextOptions): AppContext => {
  const captureDir = options.captureDir ?? getCaptureDir();
  const camera = new FrameBufferCamera(captureDir);

  return {
    locator: options.locator,
    transport: options.transport,
    camera,
    stream: new CameraStream({
      camera,
      locator: options.locator,
      transport: options.transport,
      intervalMs: options.streamIntervalMs,
    }),
    // Captures stay on disk for previews until their entry is evicted
    detections: new DetectionLog(options.detectionLogSize ?? DETECTION_LOG_SIZE, (fileName) =>
      discardCapture(path.join(captureDir, fileName))
    ),
    captureDir,
    galleryDir: options.galleryDir ?? getGalleryDir(),
  };
};
