import { Request, Response } from "express";
import path from "path";
import { z } from "zod";
import type { AppContext } from "../context";
import { galleryRecognitionSchema } from "../schemas/requestSchemas";
import { discardCapture, ImageCaptureNormalizer, PipelineOutcome } from "../services/captureNormalizer";
import { UploadImagePicker } from "../services/imagePicker";
import type { ImagePicker, ImageSource } from "../types/face";
import { sendErrorResponse } from "../utils/responseHelpers";

type GalleryRecognitionBody = z.infer<typeof galleryRecognitionSchema>;

const sendOutcome = async (ctx: AppContext, res: Response, outcome: PipelineOutcome): Promise<void> => {
  switch (outcome.status) {
    case "cancelled":
      res.status(204).end();
      return;
    case "failed":
      // Only recognized captures are kept for previews
      if (outcome.capturePath) {
        await discardCapture(outcome.capturePath);
      }
      sendErrorResponse(res, outcome.error);
      return;
    case "recognized": {
      const captureFile = path.basename(outcome.capturePath);
      await ctx.detections.remember(captureFile, outcome.box);
      res.json({
        capture_file: captureFile,
        cropped_file: path.basename(outcome.image.path),
        box: outcome.box,
        result: outcome.result,
        ...outcome.dialog,
      });
    }
  }
};

export const createRecognitionController = (ctx: AppContext) => {
  const recognize = async (res: Response, source: ImageSource, picker: ImagePicker): Promise<void> => {
    const normalizer = new ImageCaptureNormalizer({
      picker,
      locator: ctx.locator,
      transport: ctx.transport,
    });
    await sendOutcome(ctx, res, await normalizer.run(source));
  };

  return {
    /**
     * POST /recognize/camera
     * Multipart `file` is the camera shot; no file means the user cancelled
     */
    recognizeFromCamera: async (req: Request, res: Response): Promise<void> => {
      try {
        const picker = new UploadImagePicker({
          captureDir: ctx.captureDir,
          galleryDir: ctx.galleryDir,
          upload: req.file?.buffer,
        });
        await recognize(res, "camera", picker);
      } catch (error: unknown) {
        sendErrorResponse(res, error);
      }
    },

    /**
     * POST /recognize/gallery
     * `image_path` is relative to the gallery directory
     */
    recognizeFromGallery: async (
      req: Request<Record<string, string>, unknown, GalleryRecognitionBody>,
      res: Response
    ): Promise<void> => {
      try {
        const picker = new UploadImagePicker({
          captureDir: ctx.captureDir,
          galleryDir: ctx.galleryDir,
          imagePath: req.body.image_path || undefined,
        });
        await recognize(res, "gallery", picker);
      } catch (error: unknown) {
        sendErrorResponse(res, error);
      }
    },
  };
};
