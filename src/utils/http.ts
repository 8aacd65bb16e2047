import { z } from "zod";
import type { FetchLike } from "../types/image.types";
import { describeError } from "./imageErrors";

/**
 * Outcome of a single HTTP exchange. Transport failures are returned, not
 * thrown, so each caller decides whether they are fatal.
 */
export type HttpExchange =
  | { kind: "response"; response: Response; raw: string }
  | { kind: "network-error"; error: unknown };

export async function sendRequest(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<HttpExchange> {
  try {
    const response = await fetchImpl(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const raw = await response.text();
    return { kind: "response", response, raw };
  } catch (error) {
    return { kind: "network-error", error };
  }
}

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; reason: string };

export function tryParseJson(raw: string): JsonParseResult {
  try {
    const value: unknown = JSON.parse(raw);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

const serviceErrorSchema = z.object({
  error: z.union([
    z.string().trim().min(1),
    z.object({ message: z.string().trim().min(1) }),
  ]),
});

/**
 * Pull the `error` message out of a service response body. The image host
 * nests it as `{ error: { message } }`, the job service sends a plain string.
 */
export function extractServiceMessage(body: unknown): string | undefined {
  const parsed = serviceErrorSchema.safeParse(body);
  if (!parsed.success) {
    return undefined;
  }
  const { error } = parsed.data;
  return typeof error === "string" ? error : error.message;
}

export function truncate(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
