import multer from "multer";
import { UPLOAD_LIMITS } from "../config/constants";
import { DecodeError } from "../utils/errors";

// Camera frames are kept in memory; the picker decides where they land on disk
const storage = multer.memoryStorage();

// File filter to accept only images
const fileFilter = (
  req: Express.Request,
  file: Express.Multer.File,
  cb: multer.FileFilterCallback
) => {
  const allowedMimeTypes: readonly string[] = UPLOAD_LIMITS.MIME_TYPES;

  if (allowedMimeTypes.includes(file.mimetype)) {
    cb(null, true);
  } else {
    cb(new DecodeError("Invalid file type. Only JPEG, PNG, and WEBP images are allowed."));
  }
};

export const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: UPLOAD_LIMITS.FILE_SIZE,
  },
});
