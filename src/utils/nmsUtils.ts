import { calculateIoU, NormalizedBoundingBox } from "./boundingBoxUtils";

export interface ScoredBox {
  box: NormalizedBoundingBox;
  score: number;
}

/**
 * Apply Non-Maximum Suppression (NMS) to filter overlapping detections
 * @param detections - Candidate boxes in any order
 * @param iouThreshold - IoU above which the lower-scored box is dropped
 * @returns Kept detections, highest score first
 */
export const applyNMS = <T extends ScoredBox>(detections: T[], iouThreshold: number): T[] => {
  const sorted = [...detections].sort((a, b) => b.score - a.score);

  const keep: T[] = [];
  const suppressed = new Set<number>();

  for (let i = 0; i < sorted.length; i++) {
    if (suppressed.has(i)) continue;
    keep.push(sorted[i]);

    for (let j = i + 1; j < sorted.length; j++) {
      if (suppressed.has(j)) continue;
      if (calculateIoU(sorted[i].box, sorted[j].box) > iouThreshold) {
        suppressed.add(j);
      }
    }
  }

  return keep;
};
