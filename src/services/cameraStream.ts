import { STREAM_INTERVAL_MS } from "../config/constants";
import type { CameraSession, FaceLocator, RecognitionResult, RecognitionTransport, StartStreamResult } from "../types/face";
import { getErrorMessage, isDecodeError, isNoFaceError, isTransportError } from "../utils/errors";
import { discardCapture, ImageCaptureNormalizer } from "./captureNormalizer";
import { CameraFramePicker } from "./imagePicker";

interface CameraStreamOptions {
  camera: CameraSession;
  locator: FaceLocator;
  transport: RecognitionTransport;
  intervalMs?: number;
}

export interface StreamStatus {
  running: boolean;
  ticks: number;
  submitted: number;
  skipped: number;
  lastResult: RecognitionResult | null;
  lastError: string | null;
}

/**
 * Periodic capture from a live camera. Each tick runs the same pipeline as a
 * one-shot capture; a failed frame is logged and skipped, the timer keeps going.
 */
export class CameraStream {
  private timer: ReturnType<typeof setInterval> | null = null;
  private starting: Promise<StartStreamResult> | null = null;
  // Bumped by stop(); a start that sees a different value was cancelled
  private generation = 0;
  private busy = false;
  private readonly normalizer: ImageCaptureNormalizer;
  private status: Omit<StreamStatus, "running"> = {
    ticks: 0,
    submitted: 0,
    skipped: 0,
    lastResult: null,
    lastError: null,
  };

  constructor(private readonly options: CameraStreamOptions) {
    this.normalizer = new ImageCaptureNormalizer({
      picker: new CameraFramePicker(options.camera),
      locator: options.locator,
      transport: options.transport,
    });
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  isStarting(): boolean {
    return this.starting !== null;
  }

  getStatus(): StreamStatus {
    return { running: this.isRunning(), ...this.status };
  }

  /**
   * Announce the stream to the backend, open the camera and start the timer.
   * Rejects while another start is in flight; a stop() during start cancels it.
   * The camera is released again if anything fails on the way.
   */
  async start(): Promise<StartStreamResult> {
    if (this.timer || this.starting) {
      throw new Error("Stream is already running");
    }

    this.starting = this.begin(this.generation);
    try {
      return await this.starting;
    } finally {
      this.starting = null;
    }
  }

  private async begin(generation: number): Promise<StartStreamResult> {
    await this.options.camera.open();
    try {
      const reply = await this.options.transport.startStream();
      if (generation !== this.generation) {
        throw new Error("Stream was stopped while starting");
      }

      this.status = { ticks: 0, submitted: 0, skipped: 0, lastResult: null, lastError: null };
      this.timer = setInterval(() => {
        void this.tick();
      }, this.options.intervalMs ?? STREAM_INTERVAL_MS);
      console.log(`✓ Camera stream started${reply.message ? `: ${reply.message}` : ""}`);
      return reply;
    } catch (err: unknown) {
      await this.options.camera.release();
      throw err;
    }
  }

  /**
   * Capture and submit one frame, then delete its files. Overlapping ticks are dropped.
   */
  async tick(): Promise<void> {
    if (this.busy) return;
    this.busy = true;
    this.status.ticks++;

    try {
      const outcome = await this.normalizer.run("camera");
      if (outcome.status === "recognized") {
        this.status.submitted++;
        this.status.lastResult = outcome.result;
      } else if (outcome.status === "failed") {
        this.recordFailure(outcome.error);
      }
      if (outcome.status !== "cancelled" && outcome.capturePath) {
        await this.discardFrame(outcome.capturePath);
      }
    } catch (err: unknown) {
      this.recordFailure(err);
    } finally {
      this.busy = false;
    }
  }

  async stop(): Promise<void> {
    this.generation++;
    try {
      if (this.timer) {
        clearInterval(this.timer);
        console.log("✓ Camera stream stopped");
      }
    } finally {
      this.timer = null;
      await this.options.camera.release();
    }
  }

  private async discardFrame(capturePath: string): Promise<void> {
    try {
      await discardCapture(capturePath);
    } catch (err: unknown) {
      console.warn(`Could not remove stream frame ${capturePath}: ${getErrorMessage(err)}`);
    }
  }

  private recordFailure(err: unknown): void {
    this.status.skipped++;
    this.status.lastError = getErrorMessage(err);

    if (isTransportError(err) || isDecodeError(err) || isNoFaceError(err)) {
      console.warn(`Skipping stream frame: ${getErrorMessage(err)}`);
    } else {
      console.error("Stream frame failed:", err);
    }
  }
}
