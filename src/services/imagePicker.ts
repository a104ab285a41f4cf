import { randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import type { CameraSession, ImagePicker, ImageSource } from "../types/face";
import { DecodeError, getErrorMessage } from "../utils/errors";
import { detectImageExtension } from "../utils/imageUtils";

/**
 * Write an encoded image into the capture directory under a fresh name
 */
export const saveCapture = async (captureDir: string, buffer: Buffer, prefix = ""): Promise<string> => {
  await fs.mkdir(captureDir, { recursive: true });
  const filePath = path.join(captureDir, `${prefix}${randomUUID()}.${detectImageExtension(buffer)}`);
  await fs.writeFile(filePath, buffer);
  return filePath;
};

interface UploadImagePickerOptions {
  captureDir: string;
  galleryDir: string;
  /** Camera frame sent with the request */
  upload?: Buffer;
  /** Gallery image, relative to galleryDir */
  imagePath?: string;
}

/**
 * Picker for a single HTTP request: the camera shot is the uploaded file,
 * a gallery pick is a file under the gallery directory.
 * Picked images are copied into the capture directory, so later in-place
 * rewrites never touch the gallery.
 */
export class UploadImagePicker implements ImagePicker {
  constructor(private readonly options: UploadImagePickerOptions) {}

  async pickImage(source: ImageSource): Promise<string | null> {
    return source === "camera" ? this.fromCamera() : this.fromGallery();
  }

  private async fromCamera(): Promise<string | null> {
    const { upload, captureDir } = this.options;
    if (!upload || upload.length === 0) return null;
    return saveCapture(captureDir, upload);
  }

  private async fromGallery(): Promise<string | null> {
    const { imagePath, galleryDir, captureDir } = this.options;
    if (!imagePath) return null;

    const galleryRoot = path.resolve(galleryDir);
    const resolved = path.resolve(galleryRoot, imagePath);
    const relative = path.relative(galleryRoot, resolved);
    if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new DecodeError(`Image path is outside the gallery: ${imagePath}`);
    }

    let buffer: Buffer;
    try {
      buffer = await fs.readFile(resolved);
    } catch (err: unknown) {
      throw new DecodeError(`Could not read gallery image ${imagePath}: ${getErrorMessage(err)}`);
    }
    return saveCapture(captureDir, buffer);
  }
}

/**
 * Picker backed by a live camera session; used by the stream loop.
 * The gallery is not reachable from here and always reads as cancelled.
 */
export class CameraFramePicker implements ImagePicker {
  constructor(private readonly camera: CameraSession) {}

  async pickImage(source: ImageSource): Promise<string | null> {
    if (source !== "camera") return null;
    return this.camera.captureFrame();
  }
}
