import { ZodError } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ImageEditErrorCode } from '../utils/imageErrors';

// Zod error handler middleware
export function zodErrorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (err instanceof ZodError) {
    return res.status(400).json({
      success: false,
      error: {
        code: ImageEditErrorCode.VALIDATION_ERROR,
        message: err.issues[0]?.message ?? 'Validation Error',
        details: err.issues,
      },
    });
  }
  next(err);
}
