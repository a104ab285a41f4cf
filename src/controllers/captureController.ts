import { Request, Response } from "express";
import { promises as fs } from "fs";
import path from "path";
import type { AppContext } from "../context";
import { isApiUrlConfigured } from "../config/constants";
import { bufferToJimp, detectImageExtension, encodeJpeg } from "../utils/imageUtils";
import { sendErrorResponse } from "../utils/responseHelpers";
import { drawFaceBox } from "../utils/visualizationUtils";

const isNotFound = (err: unknown): boolean =>
  Boolean(err && typeof err === "object" && "code" in err && err.code === "ENOENT");

export const createCaptureController = (ctx: AppContext) => ({
  /**
   * GET /captures/:file_name
   * Preview a capture; `annotate=true` outlines the face found in it
   */
  getCapture: async (req: Request, res: Response): Promise<void> => {
    try {
      const fileName = req.params.file_name;

      let buffer: Buffer;
      try {
        buffer = await fs.readFile(path.join(ctx.captureDir, fileName));
      } catch (err: unknown) {
        if (isNotFound(err)) {
          res.status(404).json({ error: "Capture not found" });
          return;
        }
        throw err;
      }

      const box = req.query.annotate === "true" ? ctx.detections.lookup(fileName) : undefined;
      if (box) {
        const image = await bufferToJimp(buffer);
        buffer = await encodeJpeg(drawFaceBox(image, box));
      }

      res.type(detectImageExtension(buffer));
      res.send(buffer);
    } catch (error: unknown) {
      sendErrorResponse(res, error);
    }
  },

  /**
   * GET /health
   */
  getHealth: (req: Request, res: Response): void => {
    res.json({
      status: "ok",
      api_url_configured: isApiUrlConfigured(),
      stream_running: ctx.stream.isRunning(),
    });
  },
});
