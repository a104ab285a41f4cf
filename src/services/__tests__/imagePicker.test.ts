import { promises as fs } from "fs";
import path from "path";
import { FakeCamera, makeImageBuffer, makeTempDir, writeImage } from "../../__tests__/fixtures";
import { DecodeError } from "../../utils/errors";
import { CameraFramePicker, saveCapture, UploadImagePicker } from "../imagePicker";

describe("saveCapture", () => {
  let captureDir: string;

  beforeEach(async () => {
    captureDir = path.join(await makeTempDir("save"), "nested");
  });

  it("creates the directory and names the file after the image type", async () => {
    const png = await makeImageBuffer(4, 4);

    const filePath = await saveCapture(captureDir, png, "frame-");

    expect(path.dirname(filePath)).toBe(captureDir);
    expect(path.basename(filePath)).toMatch(/^frame-[0-9a-f-]{36}\.png$/);
    expect((await fs.readFile(filePath)).equals(png)).toBe(true);
  });
});

describe("UploadImagePicker", () => {
  let captureDir: string;
  let galleryDir: string;

  beforeEach(async () => {
    captureDir = await makeTempDir("captures");
    galleryDir = await makeTempDir("gallery");
  });

  afterEach(async () => {
    await fs.rm(captureDir, { recursive: true, force: true });
    await fs.rm(galleryDir, { recursive: true, force: true });
  });

  describe("camera", () => {
    it("stores the uploaded frame in the capture directory", async () => {
      const upload = await makeImageBuffer(8, 8);
      const picker = new UploadImagePicker({ captureDir, galleryDir, upload });

      const picked = await picker.pickImage("camera");

      expect(picked).not.toBeNull();
      expect(path.dirname(picked ?? "")).toBe(captureDir);
      expect((await fs.readFile(picked ?? "")).equals(upload)).toBe(true);
    });

    it("reads a missing or empty upload as cancelled", async () => {
      await expect(new UploadImagePicker({ captureDir, galleryDir }).pickImage("camera")).resolves.toBeNull();
      await expect(
        new UploadImagePicker({ captureDir, galleryDir, upload: Buffer.alloc(0) }).pickImage("camera")
      ).resolves.toBeNull();
    });
  });

  describe("gallery", () => {
    it("copies the picked image so the gallery file is never rewritten", async () => {
      const original = await writeImage(galleryDir, "portrait.png", 12, 12);
      const picker = new UploadImagePicker({ captureDir, galleryDir, imagePath: "portrait.png" });

      const picked = await picker.pickImage("gallery");

      expect(picked).not.toBe(original);
      expect(path.dirname(picked ?? "")).toBe(captureDir);
      expect((await fs.readFile(picked ?? "")).equals(await fs.readFile(original))).toBe(true);
    });

    it("reads a missing image_path as cancelled", async () => {
      await expect(new UploadImagePicker({ captureDir, galleryDir }).pickImage("gallery")).resolves.toBeNull();
    });

    it("rejects paths outside the gallery", async () => {
      const picker = new UploadImagePicker({ captureDir, galleryDir, imagePath: "../etc/passwd" });

      await expect(picker.pickImage("gallery")).rejects.toThrow(
        new DecodeError("Image path is outside the gallery: ../etc/passwd")
      );
    });

    it("reports a gallery file that does not exist", async () => {
      const picker = new UploadImagePicker({ captureDir, galleryDir, imagePath: "missing.jpg" });

      await expect(picker.pickImage("gallery")).rejects.toBeInstanceOf(DecodeError);
    });
  });
});

describe("CameraFramePicker", () => {
  it("takes camera picks from the session", async () => {
    const camera = new FakeCamera();
    camera.nextFrame = async () => "/tmp/frame.jpg";

    await expect(new CameraFramePicker(camera).pickImage("camera")).resolves.toBe("/tmp/frame.jpg");
    expect(camera.captures).toBe(1);
  });

  it("never reaches the gallery", async () => {
    const camera = new FakeCamera();

    await expect(new CameraFramePicker(camera).pickImage("gallery")).resolves.toBeNull();
    expect(camera.captures).toBe(0);
  });
});
