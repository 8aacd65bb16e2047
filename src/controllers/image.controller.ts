import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { EditPipeline } from "../services/imageEdit.service";
import { isSeedText } from "../services/runpod.service";
import type { ImagePayload } from "../types/image.types";
import { ErrorMessages, ImageEditError, ImageEditErrorCode } from "../utils/imageErrors";

export const editRequestSchema = z.object({
  runpodKey: z.string().trim().min(1, "RunPod API key is required"),
  prompt: z.string().trim().min(1, "Prompt is required"),
  negativePrompt: z.string().optional().default(""),
  seed: z
    .string()
    .trim()
    .optional()
    .refine((seed) => !seed || isSeedText(seed), "Seed must be an integer"),
});

export function createImageController(pipeline: EditPipeline) {
  /**
   * Host the uploaded image, run the edit job and return both URLs
   */
  async function editImage(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const fields = editRequestSchema.parse(req.body ?? {});

      if (!req.file || !req.file.originalname) {
        throw new ImageEditError(
          ImageEditErrorCode.NO_FILE_PROVIDED,
          ErrorMessages[ImageEditErrorCode.NO_FILE_PROVIDED] ?? "No file provided"
        );
      }

      const payload: ImagePayload = {
        bytes: req.file.buffer,
        filename: req.file.originalname,
        mimeType: req.file.mimetype,
      };

      const result = await pipeline.run(payload, {
        jobApiKey: fields.runpodKey,
        prompt: fields.prompt,
        negativePrompt: fields.negativePrompt,
        seed: fields.seed,
      });

      if (!result.ok) {
        res.status(result.error.statusCode).json({
          ...result.error.toJSON(),
          data: { originalUrl: result.originalUrl },
        });
        return;
      }

      res.status(200).json({
        success: true,
        data: {
          originalUrl: result.originalUrl,
          editedUrl: result.editedUrl,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  return { editImage };
}

export type ImageController = ReturnType<typeof createImageController>;
