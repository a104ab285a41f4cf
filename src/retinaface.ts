import { RETINAFACE } from "./config/constants";
import { cornersToBox } from "./utils/boundingBoxUtils";
import type { JimpImage } from "./utils/imageUtils";
import { applyNMS, ScoredBox } from "./utils/nmsUtils";

// RetinaFace model configurations
export const cfg_mnet = {
  name: "mobilenet0.25",
  min_sizes: [[16, 32], [64, 128], [256, 512]],
  steps: [8, 16, 32],
  variance: [0.1, 0.2],
  image_size: 640,
} as const;

export const cfg_re50 = {
  name: "Resnet50",
  min_sizes: [[16, 32], [64, 128], [256, 512]],
  steps: [8, 16, 32],
  variance: [0.1, 0.2],
  image_size: 840,
} as const;

export type RetinaFaceConfig = typeof cfg_mnet | typeof cfg_re50;
export type RetinaFaceArch = "mobile0.25" | "resnet50";

export const configForArch = (arch: RetinaFaceArch): RetinaFaceConfig =>
  arch === "resnet50" ? cfg_re50 : cfg_mnet;

/**
 * Anchor boxes as [cx, cy, w, h] in normalized coordinates, flattened
 */
export const generatePriors = (cfg: RetinaFaceConfig, imageSize: number): Float32Array => {
  const anchors: number[] = [];

  cfg.steps.forEach((step, k) => {
    const featureMap = Math.ceil(imageSize / step);
    for (let i = 0; i < featureMap; i++) {
      for (let j = 0; j < featureMap; j++) {
        for (const minSize of cfg.min_sizes[k]) {
          anchors.push(
            ((j + 0.5) * step) / imageSize,
            ((i + 0.5) * step) / imageSize,
            minSize / imageSize,
            minSize / imageSize
          );
        }
      }
    }
  });

  return Float32Array.from(anchors);
};

/**
 * Decode one anchor's location deltas into [x1, y1, x2, y2]
 */
export const decodeBox = (
  loc: ArrayLike<number>,
  priors: ArrayLike<number>,
  index: number,
  variances: readonly number[]
): [number, number, number, number] => {
  const [pcx, pcy, pw, ph] = [priors[index * 4], priors[index * 4 + 1], priors[index * 4 + 2], priors[index * 4 + 3]];

  const cx = pcx + loc[index * 4] * variances[0] * pw;
  const cy = pcy + loc[index * 4 + 1] * variances[0] * ph;
  const w = pw * Math.exp(loc[index * 4 + 2] * variances[1]);
  const h = ph * Math.exp(loc[index * 4 + 3] * variances[1]);

  return [cx - w / 2, cy - h / 2, cx + w / 2, cy + h / 2];
};

/**
 * Mean-subtracted CHW tensor data at the model's square input size
 */
export const preprocessForRetinaFace = (image: JimpImage, imageSize: number): Float32Array => {
  const resized = image.clone();
  resized.resize({ w: imageSize, h: imageSize });

  const { width, height, data } = resized.bitmap;
  const planeSize = width * height;
  const input = new Float32Array(3 * planeSize);

  for (let c = 0; c < 3; c++) {
    for (let p = 0; p < planeSize; p++) {
      input[c * planeSize + p] = data[p * 4 + c] - RETINAFACE.MEAN_BGR[c];
    }
  }

  return input;
};

export interface RetinaFaceOutputs {
  loc: ArrayLike<number>;   // [num_anchors * 4] box deltas
  conf: ArrayLike<number>;  // [num_anchors * 2] background / face scores
}

/**
 * Turn raw model outputs into scored boxes (normalized), best first after NMS
 */
export const decodeDetections = (
  outputs: RetinaFaceOutputs,
  priors: Float32Array,
  cfg: RetinaFaceConfig,
  visThreshold: number
): ScoredBox[] => {
  const numAnchors = priors.length / 4;
  const candidates: ScoredBox[] = [];

  for (let i = 0; i < numAnchors; i++) {
    const score = outputs.conf[i * 2 + 1];
    if (score <= RETINAFACE.CONFIDENCE_THRESHOLD) continue;
    candidates.push({ box: cornersToBox(decodeBox(outputs.loc, priors, i, cfg.variance)), score });
  }

  const topK = candidates.sort((a, b) => b.score - a.score).slice(0, RETINAFACE.TOP_K);

  return applyNMS(topK, RETINAFACE.NMS_THRESHOLD)
    .slice(0, RETINAFACE.KEEP_TOP_K)
    .filter((detection) => detection.score >= visThreshold);
};
