import { promises as fs } from "fs";
import { Jimp } from "jimp";
import type { FaceBoundingBox } from "../types/face";
import { DecodeError, getErrorMessage } from "./errors";

export type JimpImage = Awaited<ReturnType<typeof Jimp.read>>;

/**
 * Convert Buffer to Jimp instance
 * Decoding applies the EXIF orientation, so the bitmap is always upright
 */
export const bufferToJimp = async (buffer: Buffer): Promise<JimpImage> => {
  try {
    return await Jimp.read(buffer);
  } catch (err: unknown) {
    throw new DecodeError(`Could not decode image: ${getErrorMessage(err)}`);
  }
};

/**
 * Read and decode an image file
 */
export const decodeImageFile = async (filePath: string): Promise<JimpImage> => {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (err: unknown) {
    throw new DecodeError(`Could not read image file ${filePath}: ${getErrorMessage(err)}`);
  }
  return bufferToJimp(buffer);
};

export const encodeJpeg = async (image: JimpImage): Promise<Buffer> => {
  return image.getBuffer("image/jpeg");
};

/**
 * Clamp a rectangle to the pixel grid [0, width) x [0, height).
 * The result is never empty: a box entirely outside the image collapses
 * to a one-pixel strip on the nearest edge.
 */
export const clampCropRegion = (
  box: FaceBoundingBox,
  imageWidth: number,
  imageHeight: number
): FaceBoundingBox => {
  const left = Math.max(0, Math.min(Math.round(box.Left), imageWidth - 1));
  const top = Math.max(0, Math.min(Math.round(box.Top), imageHeight - 1));
  const right = Math.max(left + 1, Math.min(Math.round(box.Left + box.Width), imageWidth));
  const bottom = Math.max(top + 1, Math.min(Math.round(box.Top + box.Height), imageHeight));

  return {
    Left: left,
    Top: top,
    Width: right - left,
    Height: bottom - top,
  };
};

/**
 * Crop a region from a copy of the image; the source bitmap is left as is
 */
export const cropImageRegion = (
  image: JimpImage,
  box: FaceBoundingBox
): { image: JimpImage; region: FaceBoundingBox } => {
  const region = clampCropRegion(box, image.bitmap.width, image.bitmap.height);
  const cropped = image.clone();
  cropped.crop({ x: region.Left, y: region.Top, w: region.Width, h: region.Height });
  return { image: cropped, region };
};

export type ImageExtension = "jpg" | "png" | "gif" | "webp";

/**
 * File extension for an encoded image, judged by its magic bytes
 */
export const detectImageExtension = (imageBuffer: Buffer): ImageExtension => {
  const magicBytes = imageBuffer.subarray(0, 4);

  // PNG: 89 50 4E 47
  if (magicBytes[0] === 0x89 && magicBytes[1] === 0x50 && magicBytes[2] === 0x4E && magicBytes[3] === 0x47) {
    return "png";
  }
  // GIF: 47 49 46 38
  if (magicBytes[0] === 0x47 && magicBytes[1] === 0x49 && magicBytes[2] === 0x46 && magicBytes[3] === 0x38) {
    return "gif";
  }
  // WebP: RIFF....WEBP
  if (
    imageBuffer.length >= 12 &&
    magicBytes[0] === 0x52 &&
    magicBytes[1] === 0x49 &&
    magicBytes[2] === 0x46 &&
    magicBytes[3] === 0x46
  ) {
    const webpHeader = imageBuffer.subarray(8, 12);
    if (webpHeader[0] === 0x57 && webpHeader[1] === 0x45 && webpHeader[2] === 0x42 && webpHeader[3] === 0x50) {
      return "webp";
    }
  }
  // JPEG (FF D8 FF) and anything unrecognised
  return "jpg";
};
