import { z } from "zod";
import type { JobServiceConfig } from "../config/app.config";
import {
  type EditParams,
  type FetchLike,
  type JobHandle,
  type JobRequest,
  JobStatus,
  type Sleep,
} from "../types/image.types";
import { logger } from "../utils/logger";
import { extractServiceMessage, sendRequest, truncate, tryParseJson } from "../utils/http";
import { describeError, ImageEditError, ImageEditErrorCode } from "../utils/imageErrors";

const SEED_PATTERN = /^[+-]?\d+$/;
const RANDOM_SEED = -1;

const SERVICE_STATUSES = new Map<string, JobStatus>([
  ["IN_QUEUE", JobStatus.QUEUED],
  ["IN_PROGRESS", JobStatus.RUNNING],
  ["COMPLETED", JobStatus.COMPLETED],
  ["FAILED", JobStatus.FAILED],
  ["CANCELED", JobStatus.CANCELED],
  ["CANCELLED", JobStatus.CANCELED],
  ["TIMED_OUT", JobStatus.FAILED],
]);

const submitResponseSchema = z.object({
  id: z.string().trim().min(1),
});

const statusResponseSchema = z.object({
  status: z.string(),
  output: z.unknown().optional(),
});

const completedOutputSchema = z.object({
  result: z.string().trim().min(1),
});

export type PollOutcome =
  | { kind: "status"; status: JobStatus; rawStatus: string; output: unknown; body: unknown }
  | { kind: "transient"; error: ImageEditError };

export interface RunpodJobServiceDeps {
  fetch?: FetchLike;
  sleep?: Sleep;
}

export function toJobStatus(rawStatus: string): JobStatus {
  return SERVICE_STATUSES.get(rawStatus) ?? JobStatus.UNKNOWN;
}

/** True for a decimal integer string whose value a number holds exactly. */
export function isSeedText(text: string): boolean {
  return SEED_PATTERN.test(text) && Number.isSafeInteger(Number.parseInt(text, 10));
}

/**
 * Absent or blank seeds become -1, which asks the model for a random seed.
 */
export function parseSeed(seed: EditParams["seed"]): number {
  if (seed === undefined || seed === null) {
    return RANDOM_SEED;
  }
  if (typeof seed === "number") {
    if (!Number.isSafeInteger(seed)) {
      throw new ImageEditError(ImageEditErrorCode.VALIDATION_ERROR, "Seed must be an integer");
    }
    return seed;
  }

  const trimmed = seed.trim();
  if (!trimmed) {
    return RANDOM_SEED;
  }
  if (!isSeedText(trimmed)) {
    throw new ImageEditError(
      ImageEditErrorCode.VALIDATION_ERROR,
      "Seed must be an integer",
      `Received "${seed}"`
    );
  }
  return Number.parseInt(trimmed, 10);
}

export function buildJobRequest(
  imageUrl: string,
  params: Pick<EditParams, "prompt" | "negativePrompt" | "seed">
): JobRequest {
  return {
    prompt: params.prompt,
    negativePrompt: params.negativePrompt ?? "",
    seed: parseSeed(params.seed),
    imageUrl,
    outputFormat: "png",
    enableSafetyChecker: true,
  };
}

export function toServicePayload(job: JobRequest) {
  return {
    input: {
      prompt: job.prompt,
      negative_prompt: job.negativePrompt,
      seed: job.seed,
      image: job.imageUrl,
      output_format: job.outputFormat,
      enable_safety_checker: job.enableSafetyChecker,
    },
  };
}

const defaultSleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RunpodJobService {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;

  constructor(private readonly config: JobServiceConfig, deps: RunpodJobServiceDeps = {}) {
    this.fetchImpl = deps.fetch ?? globalThis.fetch;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Submit the job and poll until it settles.
   * Resolves with the edited image URL.
   */
  async run(job: JobRequest, credential: string): Promise<string> {
    const handle = await this.submit(job, credential);
    const { maxPolls, pollIntervalMs } = this.config;

    logger(`Image edit job started, ID: ${handle.id}. Starting to poll...`);

    for (let attempt = 1; attempt <= maxPolls; attempt++) {
      await this.sleep(pollIntervalMs);
      const outcome = await this.pollOnce(handle, credential);

      if (outcome.kind === "transient") {
        logger(
          `Poll ${attempt}/${maxPolls} for job ${handle.id} failed: ${outcome.error.message}`,
          "warn"
        );
        continue;
      }

      logger(`Job ${handle.id} status: ${outcome.rawStatus}`);
      const resultUrl = this.settle(handle, outcome);
      if (resultUrl !== null) {
        return resultUrl;
      }
    }

    logger(`Job ${handle.id} still unfinished after ${maxPolls} polls`, "error");
    throw new ImageEditError(
      ImageEditErrorCode.TIMEOUT,
      "Image edit job timed out (maximum polling attempts reached).",
      `Job ${handle.id}`
    );
  }

  async submit(job: JobRequest, credential: string): Promise<JobHandle> {
    this.assertCredential(credential);
    logger("Sending image edit request to job service...");

    const exchange = await sendRequest(
      this.fetchImpl,
      `${this.config.endpoint}/run`,
      {
        method: "POST",
        headers: this.headers(credential),
        body: JSON.stringify(toServicePayload(job)),
      },
      this.config.submitTimeoutMs
    );

    if (exchange.kind === "network-error") {
      const reason = describeError(exchange.error);
      logger(`Network error during job submission: ${reason}`, "error");
      throw new ImageEditError(
        ImageEditErrorCode.NETWORK_ERROR,
        `Job service error (initial request): ${reason}`
      );
    }

    const { response, raw } = exchange;
    if (!response.ok) {
      throw new ImageEditError(
        ImageEditErrorCode.SUBMISSION_ERROR,
        `Job service rejected the request with HTTP ${response.status}`,
        truncate(raw)
      );
    }

    const parsed = tryParseJson(raw);
    if (!parsed.ok) {
      throw new ImageEditError(
        ImageEditErrorCode.PROTOCOL_ERROR,
        "Job service returned a response that is not JSON",
        `${parsed.reason}: ${truncate(raw)}`
      );
    }

    const body = submitResponseSchema.safeParse(parsed.value);
    if (!body.success) {
      throw new ImageEditError(
        ImageEditErrorCode.SUBMISSION_ERROR,
        "Job service did not return a job ID.",
        truncate(raw)
      );
    }

    return { id: body.data.id };
  }

  /**
   * One status request. Transport failures and non-2xx replies come back as
   * `transient`; an unreadable 2xx body is fatal.
   */
  async pollOnce(handle: JobHandle, credential: string): Promise<PollOutcome> {
    const exchange = await sendRequest(
      this.fetchImpl,
      `${this.config.endpoint}/status/${encodeURIComponent(handle.id)}`,
      { method: "GET", headers: this.headers(credential) },
      this.config.pollTimeoutMs
    );

    if (exchange.kind === "network-error") {
      return transient(`Status request failed: ${describeError(exchange.error)}`);
    }

    const { response, raw } = exchange;
    if (!response.ok) {
      return transient(`Status request returned HTTP ${response.status}`);
    }

    const parsed = tryParseJson(raw);
    if (!parsed.ok) {
      throw new ImageEditError(
        ImageEditErrorCode.PROTOCOL_ERROR,
        "Job service returned a status response that is not JSON",
        `${parsed.reason}: ${truncate(raw)}`
      );
    }

    const body = statusResponseSchema.safeParse(parsed.value);
    if (!body.success) {
      throw new ImageEditError(
        ImageEditErrorCode.PROTOCOL_ERROR,
        "Job service status response has no status field",
        truncate(raw)
      );
    }

    return {
      kind: "status",
      status: toJobStatus(body.data.status),
      rawStatus: body.data.status,
      output: body.data.output,
      body: parsed.value,
    };
  }

  /**
   * Returns the result URL for a completed job, null while the job is still
   * pending, and throws for failed or malformed terminal states.
   */
  private settle(
    handle: JobHandle,
    outcome: Extract<PollOutcome, { kind: "status" }>
  ): string | null {
    switch (outcome.status) {
      case JobStatus.COMPLETED: {
        const output = completedOutputSchema.safeParse(outcome.output);
        if (!output.success) {
          const message = `Job ${handle.id} COMPLETED but missing 'result' (final image URL) in output.`;
          logger(message, "error");
          throw new ImageEditError(
            ImageEditErrorCode.MALFORMED_RESULT,
            message,
            truncate(JSON.stringify(outcome.output ?? null))
          );
        }
        return output.data.result;
      }

      case JobStatus.FAILED:
      case JobStatus.CANCELED: {
        const message =
          extractServiceMessage(outcome.body) ?? `Job failed with status: ${outcome.rawStatus}`;
        logger(`Job ${handle.id} failed: ${message}`, "error");
        throw new ImageEditError(
          ImageEditErrorCode.JOB_FAILED,
          `Image edit job failed: ${message}`
        );
      }

      default:
        return null;
    }
  }

  private assertCredential(credential: string): void {
    if (!credential.trim()) {
      throw new ImageEditError(
        ImageEditErrorCode.CONFIGURATION_ERROR,
        "Job service API key is required."
      );
    }
  }

  private headers(credential: string): Record<string, string> {
    return {
      "Content-Type": "application/json",
      Authorization: `Bearer ${credential}`,
    };
  }
}

function transient(message: string): PollOutcome {
  return {
    kind: "transient",
    error: new ImageEditError(ImageEditErrorCode.TRANSIENT_POLL_ERROR, message),
  };
}
