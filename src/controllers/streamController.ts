import { Request, Response } from "express";
import type { AppContext } from "../context";
import { sendErrorResponse } from "../utils/responseHelpers";

export const createStreamController = (ctx: AppContext) => {
  const statusBody = () => {
    const status = ctx.stream.getStatus();
    return {
      running: status.running,
      ticks: status.ticks,
      submitted: status.submitted,
      skipped: status.skipped,
      last_result: status.lastResult,
      last_error: status.lastError,
    };
  };

  return {
    /**
     * POST /stream/start
     */
    startStream: async (req: Request, res: Response): Promise<void> => {
      if (ctx.stream.isRunning() || ctx.stream.isStarting()) {
        res.status(409).json({ error: "stream_already_running" });
        return;
      }
      try {
        const reply = await ctx.stream.start();
        res.json({ running: true, message: reply.message ?? null });
      } catch (error: unknown) {
        sendErrorResponse(res, error);
      }
    },

    /**
     * POST /stream/frame
     * Latest camera frame from the front end; replaces any frame not yet captured
     */
    pushFrame: (req: Request, res: Response): void => {
      if (!req.file) {
        res.status(400).json({ error: "No image file provided" });
        return;
      }
      if (!ctx.camera.pushFrame(req.file.buffer)) {
        res.status(409).json({ error: "stream_not_running" });
        return;
      }
      res.status(202).json({ accepted: true });
    },

    /**
     * POST /stream/stop
     */
    stopStream: async (req: Request, res: Response): Promise<void> => {
      try {
        await ctx.stream.stop();
        res.json(statusBody());
      } catch (error: unknown) {
        sendErrorResponse(res, error);
      }
    },

    /**
     * GET /stream/status
     */
    getStreamStatus: (req: Request, res: Response): void => {
      res.json(statusBody());
    },
  };
};
