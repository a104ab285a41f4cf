import type { FaceBoundingBox } from "../types/face";

/**
 * Bounding box in normalized coordinates (0-1)
 */
export interface NormalizedBoundingBox {
  Left: number;
  Top: number;
  Width: number;
  Height: number;
}

/**
 * Convert normalized bounding box (0-1) to pixel coordinates
 */
export const normalizedToPixel = (
  normalized: NormalizedBoundingBox,
  imageWidth: number,
  imageHeight: number
): FaceBoundingBox => {
  return {
    Left: Math.round(normalized.Left * imageWidth),
    Top: Math.round(normalized.Top * imageHeight),
    Width: Math.round(normalized.Width * imageWidth),
    Height: Math.round(normalized.Height * imageHeight),
  };
};

/**
 * Corner form [x1, y1, x2, y2] to a Left/Top/Width/Height box
 */
export const cornersToBox = ([x1, y1, x2, y2]: readonly number[]): NormalizedBoundingBox => ({
  Left: x1,
  Top: y1,
  Width: x2 - x1,
  Height: y2 - y1,
});

export const calculateArea = (bbox: NormalizedBoundingBox): number => {
  return bbox.Width * bbox.Height;
};

/**
 * Calculate Intersection over Union (IoU) between two bounding boxes
 */
export const calculateIoU = (box1: NormalizedBoundingBox, box2: NormalizedBoundingBox): number => {
  const x1 = Math.max(box1.Left, box2.Left);
  const y1 = Math.max(box1.Top, box2.Top);
  const x2 = Math.min(box1.Left + box1.Width, box2.Left + box2.Width);
  const y2 = Math.min(box1.Top + box1.Height, box2.Top + box2.Height);

  const intersectionArea = Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
  const unionArea = calculateArea(box1) + calculateArea(box2) - intersectionArea;

  return unionArea > 0 ? intersectionArea / unionArea : 0;
};
