import type { CameraSession } from "../types/face";
import { saveCapture } from "./imagePicker";

/**
 * Camera fed by the front end: it pushes encoded frames, the stream takes the latest.
 * Each pushed frame is captured at most once.
 */
export class FrameBufferCamera implements CameraSession {
  private opened = false;
  private latestFrame: Buffer | null = null;

  constructor(private readonly captureDir: string) {}

  async open(): Promise<void> {
    this.opened = true;
    this.latestFrame = null;
  }

  isOpen(): boolean {
    return this.opened;
  }

  /**
   * Replace the pending frame; returns false while the camera is closed
   */
  pushFrame(frame: Buffer): boolean {
    if (!this.opened) return false;
    this.latestFrame = frame;
    return true;
  }

  async captureFrame(): Promise<string | null> {
    if (!this.opened) {
      throw new Error("Camera session is not open");
    }
    const frame = this.latestFrame;
    if (!frame) return null;

    this.latestFrame = null;
    return saveCapture(this.captureDir, frame, "frame-");
  }

  async release(): Promise<void> {
    this.opened = false;
    this.latestFrame = null;
  }
}
