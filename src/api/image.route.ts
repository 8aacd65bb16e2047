import { Router } from "express";
import type { ImageController } from "../controllers/image.controller";
import { uploadImage } from "../middlewares/uploadImage";

export function createImageRouter(controller: ImageController): Router {
  const router = Router();

  // Host an image and run an edit job on it
  router.post("/edit", uploadImage, controller.editImage);

  return router;
}
