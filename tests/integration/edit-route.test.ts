import type { Server } from "node:http";
import express from "express";
import multer from "multer";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../../src/app";
import { loadConfig } from "../../src/config/app.config";
import { errorHandler } from "../../src/middlewares/errorHandler";
import type { EditParams, ImagePayload, PipelineResult } from "../../src/types/image.types";
import { ImageEditError, ImageEditErrorCode } from "../../src/utils/imageErrors";

const config = loadConfig({ IMGBB_API_KEY: "test-hosting-key" });

const run = vi.fn(
  async (_payload: ImagePayload, _params: EditParams): Promise<PipelineResult> => ({
    ok: true,
    originalUrl: "https://host/x.png",
    editedUrl: "https://host/edited.png",
  })
);

const imageBytes = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 1, 2, 3, 4, 5, 6]);

function listen(app: express.Express): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(0, "127.0.0.1", () => resolve(server));
  });
}

function baseUrlOf(server: Server): string {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return `http://127.0.0.1:${address.port}`;
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

function editForm(fields: Record<string, string>, file?: { type: string; name: string }) {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  if (file) {
    form.append("image", new Blob([imageBytes], { type: file.type }), file.name);
  }
  return form;
}

describe("image edit HTTP routes", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = await listen(createApp(config, { run }));
    baseUrl = baseUrlOf(server);
  });

  afterAll(async () => {
    await close(server);
  });

  beforeEach(() => {
    run.mockClear();
  });

  it("GET /api/health reports ok", async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", message: "API is healthy" });
  });

  it("GET / reports that the hosting key is configured", async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(await response.json()).toEqual({
      success: true,
      message: "Image edit relay is running",
      hostingConfigured: true,
    });
  });

  it("POST /api/images/edit returns both URLs on success", async () => {
    const response = await fetch(`${baseUrl}/api/images/edit`, {
      method: "POST",
      body: editForm(
        { runpodKey: "test-job-key", prompt: "  add snow  ", seed: "42" },
        { type: "image/png", name: "x.png" }
      ),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      data: { originalUrl: "https://host/x.png", editedUrl: "https://host/edited.png" },
    });

    expect(run).toHaveBeenCalledTimes(1);
    const [payload, params] = run.mock.calls[0];
    expect(payload.filename).toBe("x.png");
    expect(payload.mimeType).toBe("image/png");
    expect(payload.bytes.equals(Buffer.from(imageBytes))).toBe(true);
    expect(params).toEqual({
      jobApiKey: "test-job-key",
      prompt: "add snow",
      negativePrompt: "",
      seed: "42",
    });
  });

  it("POST /api/images/edit maps a pipeline failure to its status and keeps the hosted URL", async () => {
    run.mockResolvedValueOnce({
      ok: false,
      error: new ImageEditError(ImageEditErrorCode.JOB_FAILED, "Image edit job failed: bad input"),
      originalUrl: "https://host/x.png",
    });

    const response = await fetch(`${baseUrl}/api/images/edit`, {
      method: "POST",
      body: editForm({ runpodKey: "test-job-key", prompt: "add snow" }, { type: "image/png", name: "x.png" }),
    });

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      success: false,
      error: { code: "JOB_FAILED", message: "Image edit job failed: bad input" },
      data: { originalUrl: "https://host/x.png" },
    });
  });

  it("POST /api/images/edit rejects a blank prompt", async () => {
    const response = await fetch(`${baseUrl}/api/images/edit`, {
      method: "POST",
      body: editForm({ runpodKey: "test-job-key", prompt: "   " }, { type: "image/png", name: "x.png" }),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      success: false,
      error: { code: "VALIDATION_ERROR", message: "Prompt is required" },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("POST /api/images/edit rejects a seed that is not an integer", async () => {
    const response = await fetch(`${baseUrl}/api/images/edit`, {
      method: "POST",
      body: editForm(
        { runpodKey: "test-job-key", prompt: "add snow", seed: "twelve" },
        { type: "image/png", name: "x.png" }
      ),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Seed must be an integer" },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("POST /api/images/edit rejects a seed too large to keep exactly", async () => {
    const response = await fetch(`${baseUrl}/api/images/edit`, {
      method: "POST",
      body: editForm(
        { runpodKey: "test-job-key", prompt: "add snow", seed: "18446744073709551615" },
        { type: "image/png", name: "x.png" }
      ),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: { code: "VALIDATION_ERROR", message: "Seed must be an integer" },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("POST /api/images/edit requires an image file", async () => {
    const response = await fetch(`${baseUrl}/api/images/edit`, {
      method: "POST",
      body: editForm({ runpodKey: "test-job-key", prompt: "add snow" }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: { code: "NO_FILE_PROVIDED", message: "Please select an image file to upload." },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it("POST /api/images/edit rejects files that are not images", async () => {
    const response = await fetch(`${baseUrl}/api/images/edit`, {
      method: "POST",
      body: editForm({ runpodKey: "test-job-key", prompt: "add snow" }, { type: "text/plain", name: "notes.txt" }),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: {
        code: "INVALID_FILE_TYPE",
        message: "Invalid file type. Please upload a JPEG, PNG, GIF, or WebP image.",
        details: "Received text/plain",
      },
    });
    expect(run).not.toHaveBeenCalled();
  });
});

describe("errorHandler", () => {
  it("maps an oversized upload to 413", async () => {
    const app = express();
    app.get("/too-large", (_req, _res, next) => next(new multer.MulterError("LIMIT_FILE_SIZE", "image")));
    app.use(errorHandler);
    const server = await listen(app);

    try {
      const response = await fetch(`${baseUrlOf(server)}/too-large`);
      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({
        success: false,
        error: { code: "FILE_TOO_LARGE", message: "File is too large. Maximum size is 16MB." },
      });
    } finally {
      await close(server);
    }
  });

  it("reports unexpected errors as UNKNOWN_ERROR", async () => {
    const app = express();
    app.get("/boom", (_req, _res, next) => next(new Error("database exploded")));
    app.use(errorHandler);
    const server = await listen(app);

    try {
      const response = await fetch(`${baseUrlOf(server)}/boom`);
      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({
        success: false,
        error: {
          code: "UNKNOWN_ERROR",
          message: "An unexpected error occurred. Please try again.",
          details: "database exploded",
        },
      });
    } finally {
      await close(server);
    }
  });
});
