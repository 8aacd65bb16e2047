import { NextFunction, Request, Response } from "express";
import multer from "multer";
import { logger } from "../utils/logger";
import {
  ErrorMessages,
  ImageEditError,
  ImageEditErrorCode,
  toImageEditError,
} from "../utils/imageErrors";

function fromMulterError(err: multer.MulterError): ImageEditError {
  if (err.code === "LIMIT_FILE_SIZE") {
    return new ImageEditError(
      ImageEditErrorCode.FILE_TOO_LARGE,
      ErrorMessages[ImageEditErrorCode.FILE_TOO_LARGE] ?? err.message
    );
  }
  return new ImageEditError(ImageEditErrorCode.VALIDATION_ERROR, err.message, err.field);
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const editError =
    err instanceof multer.MulterError ? fromMulterError(err) : toImageEditError(err);

  if (editError.code === ImageEditErrorCode.UNKNOWN_ERROR) {
    logger(`Unhandled error on ${req.method} ${req.originalUrl}: ${editError.details}`, "error");
  }

  res.status(editError.statusCode).json(editError.toJSON());
}
