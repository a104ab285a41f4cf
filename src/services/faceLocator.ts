import { promises as fs } from "fs";
import * as ort from "onnxruntime-web";
import { getDetectionThreshold, getFaceModelPath } from "../config/constants";
import {
  configForArch,
  decodeDetections,
  generatePriors,
  preprocessForRetinaFace,
  RetinaFaceArch,
  RetinaFaceConfig,
} from "../retinaface";
import type { CapturedImage, FaceBoundingBox, FaceLocator } from "../types/face";
import { normalizedToPixel } from "../utils/boundingBoxUtils";

type InferenceSession = Awaited<ReturnType<typeof ort.InferenceSession.create>>;

interface RetinaFaceLocatorOptions {
  modelPath?: string;
  arch?: RetinaFaceArch;
  visThreshold?: number;
}

/**
 * On-device face detector running a RetinaFace ONNX model
 */
export class RetinaFaceLocator implements FaceLocator {
  private session: InferenceSession | null = null;
  private readonly config: RetinaFaceConfig;
  private readonly priors: Float32Array;
  private readonly modelPath: string;
  private readonly visThreshold: number;

  constructor(options: RetinaFaceLocatorOptions = {}) {
    this.modelPath = options.modelPath ?? getFaceModelPath();
    this.visThreshold = options.visThreshold ?? getDetectionThreshold();
    this.config = configForArch(options.arch ?? "mobile0.25");
    this.priors = generatePriors(this.config, this.config.image_size);
  }

  async init(): Promise<void> {
    const model = await fs.readFile(this.modelPath);
    this.session = await ort.InferenceSession.create(model);
    console.log(`✓ RetinaFace ${this.config.name} model loaded from ${this.modelPath}`);
  }

  async locate(captured: CapturedImage): Promise<FaceBoundingBox[]> {
    if (!this.session) {
      throw new Error("RetinaFace model not initialized");
    }

    const size = this.config.image_size;
    const input = preprocessForRetinaFace(captured.image, size);
    const tensor = new ort.Tensor("float32", input, [1, 3, size, size]);
    const outputs = await this.session.run({ [this.session.inputNames[0]]: tensor });

    // Outputs are told apart by their last dimension: 4 = loc, 2 = conf, 10 = landmarks
    let loc: Float32Array | undefined;
    let conf: Float32Array | undefined;
    for (const output of Object.values(outputs)) {
      const lastDim = output.dims[output.dims.length - 1];
      if (!(output.data instanceof Float32Array)) continue;
      if (lastDim === 4) loc = output.data;
      else if (lastDim === 2) conf = output.data;
    }

    if (!loc || !conf) {
      throw new Error("Failed to extract RetinaFace outputs");
    }

    return decodeDetections({ loc, conf }, this.priors, this.config, this.visThreshold).map(
      (detection) => normalizedToPixel(detection.box, captured.width, captured.height)
    );
  }
}
