import type { FaceBoundingBox } from "../types/face";
import type { JimpImage } from "./imageUtils";

interface DrawOptions {
  color?: number; // Jimp RGBA color (default: red)
  lineWidth?: number;
}

/**
 * Outline a face box in place. The stroke lies inside the box and is clipped to the image.
 */
export const drawFaceBox = (
  image: JimpImage,
  box: FaceBoundingBox,
  { color = 0xff0000ff, lineWidth = 3 }: DrawOptions = {}
): JimpImage => {
  const { width: imgWidth, height: imgHeight } = image.bitmap;
  const right = box.Left + box.Width - 1;
  const bottom = box.Top + box.Height - 1;

  const plot = (x: number, y: number): void => {
    if (x >= 0 && x < imgWidth && y >= 0 && y < imgHeight) {
      image.setPixelColor(color, x, y);
    }
  };

  for (let i = 0; i < lineWidth; i++) {
    for (let x = box.Left; x <= right; x++) {
      plot(x, box.Top + i);
      plot(x, bottom - i);
    }
    for (let y = box.Top; y <= bottom; y++) {
      plot(box.Left + i, y);
      plot(right - i, y);
    }
  }

  return image;
};
