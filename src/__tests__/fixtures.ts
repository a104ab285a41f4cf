/**
 * Test doubles and image helpers shared by the test suites
 */
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { Jimp } from "jimp";
import type {
  CameraSession,
  CapturedImage,
  FaceBoundingBox,
  FaceLocator,
  ImagePicker,
  ImageSource,
  RecognitionResult,
  RecognitionTransport,
  StartStreamResult,
} from "../types/face";

export const makeTempDir = (prefix: string): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));

// White, with the left `darkColumns` columns black
const twoToneImage = (width: number, height: number, darkColumns: number) => {
  const image = new Jimp({ width, height, color: 0xffffffff });
  for (let x = 0; x < darkColumns; x++) {
    for (let y = 0; y < height; y++) {
      image.setPixelColor(0x000000ff, x, y);
    }
  }
  return image;
};

/**
 * PNG of the given size: white, with the left `darkColumns` columns black
 */
export const makeImageBuffer = async (
  width: number,
  height: number,
  darkColumns = 0
): Promise<Buffer> => twoToneImage(width, height, darkColumns).getBuffer("image/png");

/**
 * JPEG carrying an EXIF APP1 segment with only the Orientation tag.
 * Pixels are stored as for `makeImageBuffer`; viewers rotate them per `orientation`.
 */
export const makeExifJpeg = async (
  width: number,
  height: number,
  darkColumns: number,
  orientation: number
): Promise<Buffer> => {
  const jpeg = await twoToneImage(width, height, darkColumns).getBuffer("image/jpeg");

  const app1 = Buffer.from([
    0xff, 0xe1, 0x00, 0x22,                         // APP1, length 34
    0x45, 0x78, 0x69, 0x66, 0x00, 0x00,             // "Exif\0\0"
    0x4d, 0x4d, 0x00, 0x2a, 0x00, 0x00, 0x00, 0x08, // big-endian TIFF header, IFD0 at 8
    0x00, 0x01,                                     // one entry
    0x01, 0x12, 0x00, 0x03, 0x00, 0x00, 0x00, 0x01, // Orientation, SHORT, count 1
    0x00, orientation, 0x00, 0x00,
    0x00, 0x00, 0x00, 0x00,                         // no next IFD
  ]);

  // Keep a leading JFIF APP0 segment first
  let insertAt = 2;
  if (jpeg[2] === 0xff && jpeg[3] === 0xe0) {
    insertAt = 4 + jpeg.readUInt16BE(4);
  }
  return Buffer.concat([jpeg.subarray(0, insertAt), app1, jpeg.subarray(insertAt)]);
};

export const writeImage = async (
  dir: string,
  name: string,
  width: number,
  height: number,
  darkColumns = 0
): Promise<string> => {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, await makeImageBuffer(width, height, darkColumns));
  return filePath;
};

export const red = (rgba: number): number => (rgba >>> 24) & 0xff;
export const green = (rgba: number): number => (rgba >>> 16) & 0xff;

export class FakeLocator implements FaceLocator {
  public readonly calls: CapturedImage[] = [];

  constructor(public boxes: FaceBoundingBox[] = []) {}

  async locate(image: CapturedImage): Promise<FaceBoundingBox[]> {
    this.calls.push(image);
    return this.boxes;
  }
}

export class FakeTransport implements RecognitionTransport {
  public readonly recognized: Buffer[] = [];
  public startStreamCalls = 0;
  public reply: RecognitionResult = { text: "Alice", match: null };
  public recognizeError: Error | null = null;
  public startStreamReply: StartStreamResult = { message: "stream started" };
  public startStreamError: Error | null = null;

  async startStream(): Promise<StartStreamResult> {
    this.startStreamCalls++;
    if (this.startStreamError) throw this.startStreamError;
    return this.startStreamReply;
  }

  async recognize(bytes: Buffer): Promise<RecognitionResult> {
    this.recognized.push(bytes);
    if (this.recognizeError) throw this.recognizeError;
    return this.reply;
  }
}

export class FakePicker implements ImagePicker {
  public readonly requests: ImageSource[] = [];

  constructor(public filePath: string | null) {}

  async pickImage(source: ImageSource): Promise<string | null> {
    this.requests.push(source);
    return this.filePath;
  }
}

export class FakeCamera implements CameraSession {
  public opened = 0;
  public released = 0;
  public captures = 0;
  public nextFrame: () => Promise<string | null> = async () => null;

  async open(): Promise<void> {
    this.opened++;
  }

  async captureFrame(): Promise<string | null> {
    this.captures++;
    return this.nextFrame();
  }

  async release(): Promise<void> {
    this.released++;
  }
}
