import type { ImageEditError } from "../utils/imageErrors";

export enum JobStatus {
    QUEUED = "QUEUED",
    RUNNING = "RUNNING",
    COMPLETED = "COMPLETED",
    FAILED = "FAILED",
    CANCELED = "CANCELED",
    UNKNOWN = "UNKNOWN",
}

export interface ImagePayload {
    readonly bytes: Buffer;
    readonly filename: string;
    readonly mimeType?: string;
}

export interface HostedArtifact {
    url: string;
    filename: string;
}

export interface JobRequest {
    readonly prompt: string;
    readonly negativePrompt: string;
    readonly seed: number;
    readonly imageUrl: string;
    readonly outputFormat: "png";
    readonly enableSafetyChecker: true;
}

export interface JobHandle {
    readonly id: string;
}

export interface EditParams {
    jobApiKey: string;
    prompt: string;
    negativePrompt?: string;
    seed?: string | number | null;
}

export type PipelineResult =
    | { ok: true; originalUrl: string; editedUrl: string }
    | { ok: false; error: ImageEditError; originalUrl: string | null };

export type FetchLike = typeof fetch;

export type Sleep = (ms: number) => Promise<void>;
