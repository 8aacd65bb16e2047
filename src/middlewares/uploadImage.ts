import multer from "multer";
import {
  ErrorMessages,
  ImageEditError,
  ImageEditErrorCode,
} from "../utils/imageErrors";

export const MAX_UPLOAD_BYTES = 16 * 1024 * 1024;

export const ALLOWED_MIME_TYPES = ["image/jpeg", "image/png", "image/gif", "image/webp"];

// Kept in memory: the buffer is handed to the image host as-is
const storage = multer.memoryStorage();

// File filter - only allow images
const fileFilter = (
  req: Express.Request,
  file: Express.Multer.File,
  cb: multer.FileFilterCallback
) => {
  if (ALLOWED_MIME_TYPES.includes(file.mimetype)) {
    cb(null, true);
  } else {
    cb(
      new ImageEditError(
        ImageEditErrorCode.INVALID_FILE_TYPE,
        ErrorMessages[ImageEditErrorCode.INVALID_FILE_TYPE] ?? "Invalid file type",
        `Received ${file.mimetype}`
      )
    );
  }
};

const upload = multer({
  storage,
  fileFilter,
  limits: {
    fileSize: MAX_UPLOAD_BYTES,
    files: 1,
  },
});

export const uploadImage = upload.single("image");
