import type { AppConfig } from "../config/app.config";
import type {
  EditParams,
  HostedArtifact,
  ImagePayload,
  JobRequest,
  PipelineResult,
} from "../types/image.types";
import { logger } from "../utils/logger";
import { toImageEditError } from "../utils/imageErrors";
import { ImgbbHostingService } from "./imgbb.service";
import { buildJobRequest, parseSeed, RunpodJobService, type RunpodJobServiceDeps } from "./runpod.service";

export interface ArtifactHoster {
  upload(payload: ImagePayload, credential: string | null | undefined): Promise<HostedArtifact>;
}

export interface AsyncJobClient {
  run(job: JobRequest, credential: string): Promise<string>;
}

export interface EditPipeline {
  run(payload: ImagePayload, params: EditParams): Promise<PipelineResult>;
}

/**
 * Hosts the source image, then runs the edit job against the hosted URL.
 * Any failure ends the run; the hosted URL is kept for display when the
 * upload already succeeded.
 */
export class ImageEditPipeline implements EditPipeline {
  constructor(
    private readonly hoster: ArtifactHoster,
    private readonly jobs: AsyncJobClient,
    private readonly hostingApiKey: string | null
  ) {}

  async run(payload: ImagePayload, params: EditParams): Promise<PipelineResult> {
    let originalUrl: string | null = null;

    try {
      // Rejects a bad seed before anything is uploaded
      parseSeed(params.seed);

      const hosted = await this.hoster.upload(payload, this.hostingApiKey);
      originalUrl = hosted.url;

      const job = buildJobRequest(hosted.url, params);
      const editedUrl = await this.jobs.run(job, params.jobApiKey);

      logger(`Image edit completed: ${editedUrl}`);
      return { ok: true, originalUrl, editedUrl };
    } catch (error) {
      const editError = toImageEditError(error);
      logger(`Pipeline failed: ${editError.message}`, "error");
      return { ok: false, error: editError, originalUrl };
    }
  }
}

export function createImageEditPipeline(
  config: AppConfig,
  deps: RunpodJobServiceDeps = {}
): ImageEditPipeline {
  return new ImageEditPipeline(
    new ImgbbHostingService(config.hosting, deps.fetch),
    new RunpodJobService(config.jobs, deps),
    config.hosting.apiKey
  );
}
