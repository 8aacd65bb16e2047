import { z } from "zod";
import { ImageEditError, ImageEditErrorCode } from "../utils/imageErrors";

/**
 * Service settings, read once at process start and passed to each component.
 * Nothing here changes after `loadConfig` returns.
 */

export interface HostingConfig {
  apiKey: string | null;
  uploadUrl: string;
  timeoutMs: number;
}

export interface JobServiceConfig {
  endpoint: string;
  submitTimeoutMs: number;
  pollTimeoutMs: number;
  pollIntervalMs: number;
  maxPolls: number;
}

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  hosting: HostingConfig;
  jobs: JobServiceConfig;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(3003),
  CORS_ORIGINS: z.string().optional(),
  IMGBB_API_KEY: z.string().optional(),
  IMGBB_UPLOAD_URL: z.string().url().default("https://api.imgbb.com/1/upload"),
  RUNPOD_ENDPOINT: z.string().url().default("https://api.runpod.ai/v2/qwen-image-edit"),
  UPLOAD_TIMEOUT_MS: positiveInt(30_000),
  SUBMIT_TIMEOUT_MS: positiveInt(60_000),
  POLL_TIMEOUT_MS: positiveInt(5_000),
  POLL_INTERVAL_MS: positiveInt(3_000),
  MAX_POLLS: positiveInt(100),
});

const DEFAULT_CORS_ORIGIN = "http://localhost:3000";

function parseOrigins(raw: string | undefined): string[] {
  const origins = raw
    ? raw.split(",").map((origin) => origin.trim()).filter(Boolean)
    : [];

  if (!origins.includes(DEFAULT_CORS_ORIGIN)) {
    origins.push(DEFAULT_CORS_ORIGIN);
  }
  return origins;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ImageEditError(
      ImageEditErrorCode.CONFIGURATION_ERROR,
      "Invalid environment configuration",
      issues
    );
  }

  const vars = parsed.data;
  const apiKey = vars.IMGBB_API_KEY?.trim();

  return Object.freeze({
    port: vars.PORT,
    corsOrigins: parseOrigins(vars.CORS_ORIGINS),
    hosting: Object.freeze({
      apiKey: apiKey ? apiKey : null,
      uploadUrl: vars.IMGBB_UPLOAD_URL,
      timeoutMs: vars.UPLOAD_TIMEOUT_MS,
    }),
    jobs: Object.freeze({
      endpoint: vars.RUNPOD_ENDPOINT.replace(/\/$/, ""),
      submitTimeoutMs: vars.SUBMIT_TIMEOUT_MS,
      pollTimeoutMs: vars.POLL_TIMEOUT_MS,
      pollIntervalMs: vars.POLL_INTERVAL_MS,
      maxPolls: vars.MAX_POLLS,
    }),
  });
}
