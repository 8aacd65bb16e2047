import express, { Express } from "express";
import cors from "cors";
import type { AppConfig } from "./config/app.config";
import healthRoute from "./api/health.route";
import { createImageRouter } from "./api/image.route";
import { createImageController } from "./controllers/image.controller";
import { errorHandler } from "./middlewares/errorHandler";
import { zodErrorHandler } from "./middlewares/zodErrorHandler";
import { createImageEditPipeline, EditPipeline } from "./services/imageEdit.service";

export function createApp(
    config: AppConfig,
    pipeline: EditPipeline = createImageEditPipeline(config)
): Express {
    const app = express();

    /* =======================
       CORS CONFIG
    ======================= */

    app.use(
        cors({
            origin: (origin, callback) => {
                // allow server-to-server & curl
                if (!origin) return callback(null, true);

                if (config.corsOrigins.includes(origin)) {
                    return callback(null, true);
                }

                return callback(new Error("Not allowed by CORS"));
            },
            methods: ["GET", "POST", "OPTIONS"],
            allowedHeaders: ["Content-Type"],
        })
    );

    /* =======================
       MIDDLEWARES
    ======================= */

    app.use(express.json());

    /* =======================
       ROUTES
    ======================= */

    app.get("/", (_req, res) => {
        const hostingConfigured = config.hosting.apiKey !== null;
        res.status(200).json({
            success: true,
            message: hostingConfigured
                ? "Image edit relay is running"
                : "ERROR: IMGBB_API_KEY environment variable is not set on the server.",
            hostingConfigured,
        });
    });

    app.use("/api", healthRoute);
    app.use("/api/images", createImageRouter(createImageController(pipeline)));

    /* =======================
       ERROR HANDLERS
    ======================= */

    app.use(zodErrorHandler);
    app.use(errorHandler);

    return app;
}
