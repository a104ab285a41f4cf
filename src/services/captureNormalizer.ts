import { promises as fs } from "fs";
import path from "path";
import { CROPPED_SUFFIX } from "../config/constants";
import type {
  CapturedImage,
  DetectAndCropResult,
  FaceBoundingBox,
  FaceLocator,
  ImagePicker,
  ImageSource,
  NormalizedImage,
  PipelineState,
  RecognitionResult,
  RecognitionTransport,
} from "../types/face";
import {
  DecodeError,
  Dialog,
  getErrorMessage,
  isNoSelectionError,
  NoFaceDetectedError,
  NoSelectionError,
  toDialog,
} from "../utils/errors";
import { cropImageRegion, decodeImageFile, encodeJpeg } from "../utils/imageUtils";

export type PipelineOutcome =
  | {
      status: "recognized";
      capturePath: string;
      image: NormalizedImage;
      box: FaceBoundingBox;
      result: RecognitionResult;
      dialog: Dialog;
    }
  | { status: "cancelled" }
  | { status: "failed"; capturePath?: string; error: unknown; dialog: Dialog };

interface ImageCaptureNormalizerOptions {
  picker: ImagePicker;
  locator: FaceLocator;
  transport: RecognitionTransport;
  onStateChange?: (state: PipelineState) => void;
}

/**
 * `<dir>/<name>.<ext>` becomes `<dir>/<name>_cropped.jpg`
 */
export const croppedPathFor = (originalPath: string): string => {
  const { dir, name } = path.parse(originalPath);
  return path.join(dir, `${name}${CROPPED_SUFFIX}`);
};

/**
 * Delete a capture and its face crop; missing files are fine
 */
export const discardCapture = async (capturePath: string): Promise<void> => {
  await Promise.all([
    fs.rm(capturePath, { force: true }),
    fs.rm(croppedPathFor(capturePath), { force: true }),
  ]);
};

/**
 * Turns a picked photo into an upright, face-cropped JPEG and sends it for recognition.
 *
 * One instance runs one pipeline at a time:
 * idle → capturing → detecting → submitting → idle. Any failure goes straight
 * back to idle and nothing is retried.
 */
export class ImageCaptureNormalizer {
  private state: PipelineState = "idle";

  constructor(private readonly options: ImageCaptureNormalizerOptions) {}

  getState(): PipelineState {
    return this.state;
  }

  /**
   * Pick and decode an image. A cancelled pick raises NoSelectionError.
   */
  async acquire(source: ImageSource): Promise<CapturedImage> {
    return this.decode(await this.pick(source));
  }

  /**
   * Rewrite the file as an upright JPEG at the same path.
   * The original bytes are gone afterwards.
   */
  async normalizeOrientation(captured: CapturedImage): Promise<CapturedImage> {
    const buffer = await encodeJpeg(captured.image);
    await fs.writeFile(captured.path, buffer);
    return {
      path: captured.path,
      width: captured.image.bitmap.width,
      height: captured.image.bitmap.height,
      image: captured.image,
    };
  }

  /**
   * Crop to the first detected face. With no face the image passes through
   * untouched and `box` is null.
   */
  async detectAndCrop(captured: CapturedImage): Promise<DetectAndCropResult> {
    const boxes = await this.options.locator.locate(captured);

    if (boxes.length === 0) {
      return {
        image: { path: captured.path, width: captured.width, height: captured.height, cropped: false },
        box: null,
      };
    }

    const { image: face, region } = cropImageRegion(captured.image, boxes[0]);
    const croppedPath = croppedPathFor(captured.path);
    await fs.writeFile(croppedPath, await encodeJpeg(face));

    return {
      image: { path: croppedPath, width: region.Width, height: region.Height, cropped: true },
      box: region,
    };
  }

  /**
   * Send the final bytes in exactly one request
   */
  async submit(image: NormalizedImage): Promise<RecognitionResult> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(image.path);
    } catch (err: unknown) {
      throw new DecodeError(`Could not read ${image.path}: ${getErrorMessage(err)}`);
    }
    return this.options.transport.recognize(bytes);
  }

  /**
   * Full pipeline for one capture event. Never throws; a cancelled pick is a no-op.
   */
  async run(source: ImageSource): Promise<PipelineOutcome> {
    let capturePath: string | undefined;

    try {
      this.transition("capturing");
      capturePath = await this.pick(source);
      const captured = await this.normalizeOrientation(await this.decode(capturePath));

      this.transition("detecting");
      const { image, box } = await this.detectAndCrop(captured);
      if (!box) {
        throw new NoFaceDetectedError();
      }

      this.transition("submitting");
      const result = await this.submit(image);

      return {
        status: "recognized",
        capturePath,
        image,
        box,
        result,
        dialog: { title: "Recognition result", message: result.text },
      };
    } catch (err: unknown) {
      if (isNoSelectionError(err)) {
        return { status: "cancelled" };
      }
      return { status: "failed", capturePath, error: err, dialog: toDialog(err) };
    } finally {
      this.transition("idle");
    }
  }

  private async pick(source: ImageSource): Promise<string> {
    const filePath = await this.options.picker.pickImage(source);
    if (!filePath) {
      throw new NoSelectionError();
    }
    return filePath;
  }

  private async decode(filePath: string): Promise<CapturedImage> {
    const image = await decodeImageFile(filePath);
    return { path: filePath, width: image.bitmap.width, height: image.bitmap.height, image };
  }

  private transition(next: PipelineState): void {
    if (this.state === next) return;
    this.state = next;
    this.options.onStateChange?.(next);
  }
}
