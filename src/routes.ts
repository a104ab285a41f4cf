import express from "express";
import type { AppContext } from "./context";
import { createCaptureController } from "./controllers/captureController";
import { createRecognitionController } from "./controllers/recognitionController";
import { createStreamController } from "./controllers/streamController";
import { upload } from "./middleware/upload";
import { validateBody, validateParams, validateQuery } from "./middleware/validation";
import {
  captureFileSchema,
  capturePreviewQuerySchema,
  galleryRecognitionSchema,
} from "./schemas/requestSchemas";

export const createRouter = (ctx: AppContext): express.Router => {
  const router = express.Router();
  const recognition = createRecognitionController(ctx);
  const stream = createStreamController(ctx);
  const captures = createCaptureController(ctx);

  // One-shot capture
  router.post("/recognize/camera", upload.single("file"), recognition.recognizeFromCamera);
  router.post("/recognize/gallery", validateBody(galleryRecognitionSchema), recognition.recognizeFromGallery);

  // Live stream
  router.post("/stream/start", stream.startStream);
  router.post("/stream/frame", upload.single("file"), stream.pushFrame);
  router.post("/stream/stop", stream.stopStream);
  router.get("/stream/status", stream.getStreamStatus);

  // Previews
  router.get(
    "/captures/:file_name",
    validateParams(captureFileSchema),
    validateQuery(capturePreviewQuerySchema),
    captures.getCapture
  );
  router.get("/health", captures.getHealth);

  return router;
};
