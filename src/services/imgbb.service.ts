import { z } from "zod";
import type { HostingConfig } from "../config/app.config";
import type { FetchLike, HostedArtifact, ImagePayload } from "../types/image.types";
import { logger } from "../utils/logger";
import { extractServiceMessage, sendRequest, truncate, tryParseJson } from "../utils/http";
import { describeError, ImageEditError, ImageEditErrorCode } from "../utils/imageErrors";

const uploadResponseSchema = z.object({
  success: z.boolean(),
  data: z
    .object({
      url: z.string().optional(),
    })
    .optional(),
});

/**
 * Reduce a client-supplied filename to a safe ASCII name
 */
export function secureFilename(filename: string): string {
  const ascii = filename.normalize("NFKD").replace(/[^\x00-\x7f]/g, "");
  const joined = ascii.replace(/[\\/]/g, " ").trim().split(/\s+/).join("_");
  const cleaned = joined.replace(/[^A-Za-z0-9_.-]/g, "").replace(/^[._]+|[._]+$/g, "");
  return cleaned || "image";
}

export class ImgbbHostingService {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: HostingConfig, fetchImpl?: FetchLike) {
    this.fetchImpl = fetchImpl ?? globalThis.fetch;
  }

  /**
   * Upload the payload and return its public URL.
   * Makes exactly one request and never retries.
   * @throws ImageEditError classified as configuration, network, rejection or protocol failure
   */
  async upload(
    payload: ImagePayload,
    credential: string | null | undefined
  ): Promise<HostedArtifact> {
    const apiKey = credential?.trim();
    if (!apiKey) {
      throw new ImageEditError(
        ImageEditErrorCode.CONFIGURATION_ERROR,
        "IMGBB_API_KEY environment variable is not set."
      );
    }

    const filename = secureFilename(payload.filename);
    // The buffer is encoded once; the encoded copy is the only thing sent.
    const form = new URLSearchParams({
      image: payload.bytes.toString("base64"),
      name: filename,
    });

    logger(`Uploading ${filename} (${payload.bytes.length} bytes) to image host...`);

    const exchange = await sendRequest(
      this.fetchImpl,
      `${this.config.uploadUrl}?key=${encodeURIComponent(apiKey)}`,
      { method: "POST", body: form },
      this.config.timeoutMs
    );

    if (exchange.kind === "network-error") {
      const reason = describeError(exchange.error);
      logger(`Network error during image upload: ${reason}`, "error");
      throw new ImageEditError(
        ImageEditErrorCode.NETWORK_ERROR,
        `Network error with image host: ${reason}`
      );
    }

    const { response, raw } = exchange;
    const parsed = tryParseJson(raw);

    if (!response.ok) {
      const message =
        (parsed.ok ? extractServiceMessage(parsed.value) : undefined) ??
        `HTTP ${response.status}`;
      logger(`Image upload rejected: ${message}`, "error");
      throw new ImageEditError(
        ImageEditErrorCode.UPLOAD_REJECTED,
        `Image upload failed: ${message}`
      );
    }

    if (!parsed.ok) {
      throw new ImageEditError(
        ImageEditErrorCode.PROTOCOL_ERROR,
        "Image host returned a response that is not JSON",
        `${parsed.reason}: ${truncate(raw)}`
      );
    }

    const body = uploadResponseSchema.safeParse(parsed.value);
    if (!body.success) {
      throw new ImageEditError(
        ImageEditErrorCode.PROTOCOL_ERROR,
        "Image host returned an unexpected response",
        truncate(raw)
      );
    }

    if (!body.data.success) {
      const message = extractServiceMessage(parsed.value) ?? "Unknown Error";
      logger(`Image upload failed: ${message}`, "error");
      throw new ImageEditError(
        ImageEditErrorCode.UPLOAD_REJECTED,
        `Image upload failed: ${message}`
      );
    }

    const url = body.data.data?.url;
    if (!url) {
      throw new ImageEditError(
        ImageEditErrorCode.PROTOCOL_ERROR,
        "Image host reported success without a hosted URL",
        truncate(raw)
      );
    }

    logger(`Image upload successful. URL: ${url}`);
    return { url, filename };
  }
}
