/**
 * Backend Index - Server Entry Point
 *
 * Wires the device backend, camera manager, persistence and HTTP surface,
 * and shuts them down in order on SIGINT/SIGTERM.
 */

import fs from "fs";
import type { FastifyInstance } from "fastify";
import { CAMERA_DEFAULTS } from "@camstation/config";
import { PATHS } from "@camstation/config/node";
import { createLogger } from "@camstation/utils";
import { createApp } from "./app";
import { initDatabase, closeDatabase, type AppDatabase } from "./db";
import { env, validateEnv } from "./config/env";
import {
  CameraManager,
  SharpFrameEncoder,
  createBackend,
  createFfmpegWriterFactory,
  getBackendDisplayName,
} from "./camera";
import { SettingsStore } from "./services/settings-store";
import { MediaLibrary } from "./services/media-library";
import { CameraWebSocketServer } from "./services/camera-websocket";

const logger = createLogger("server");

interface RunningServer {
  app: FastifyInstance;
  manager: CameraManager;
  websocket: CameraWebSocketServer | null;
  detachMedia: (() => void) | null;
}

let running: RunningServer | null = null;

export interface ServerOptions {
  port?: number;
  host?: string;
}

export async function startServer(options: ServerOptions = {}): Promise<void> {
  if (running) {
    logger.warn("Server already started");
    return;
  }

  logger.info("Starting Camstation Backend Server...");
  validateEnv();

  for (const dir of [PATHS.DATA, PATHS.LOGS]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info(`Created directory: ${dir}`);
    }
  }

  // Initialize database (optional - the camera works without it)
  let db: AppDatabase | null = null;
  try {
    db = initDatabase(env.databasePath);
  } catch (dbError) {
    logger.warn("Database initialization failed, continuing without database:", dbError);
  }

  const settings = new SettingsStore(db, {
    imageOutputDir: env.timelapseOutputPath,
    videoOutputDir: env.videoOutputPath,
    timelapseIntervalSeconds: CAMERA_DEFAULTS.TIMELAPSE_INTERVAL_SECONDS,
    timelapseOverride: null,
  });
  const current = settings.get();

  logger.info(`Camera backend: ${getBackendDisplayName(env.cameraBackend)}`);
  const manager = new CameraManager({
    backend: createBackend(env.cameraBackend, {
      v4l2CtlPath: env.v4l2CtlPath,
      ffmpegPath: env.ffmpegPath,
      mockFailureMode: env.mockFailureMode,
    }),
    encoder: new SharpFrameEncoder(),
    writerFactory: createFfmpegWriterFactory(env.ffmpegPath),
    outputDirs: {
      timelapse: current.imageOutputDir,
      videos: current.videoOutputDir,
      photos: env.photoOutputPath,
    },
    defaultDevice: env.cameraDevice,
    session: {
      fps: env.captureFps,
      readTimeoutMs: env.readTimeoutMs,
      readFailureThreshold: env.readFailureThreshold,
    },
    previewQuality: env.previewJpegQuality,
    settings,
  });

  const media = db ? new MediaLibrary(db) : null;
  const detachMedia = media ? media.attach(manager) : null;

  const app = await createApp({ manager, settings, media });

  const port = options.port ?? env.port;
  const host = options.host ?? "0.0.0.0";
  await app.listen({ port, host });
  logger.info(`Server listening on http://${host}:${port}`);
  logger.info(`Environment: ${env.nodeEnv}`);

  let websocket: CameraWebSocketServer | null = null;
  try {
    websocket = new CameraWebSocketServer(app.server, manager);
  } catch (wsError) {
    logger.warn("Failed to initialize WebSocket server:", wsError);
  }

  running = { app, manager, websocket, detachMedia };

  // The HTTP surface stays up without a camera; routes answer 503
  try {
    const device = await manager.initialize();
    if (device) {
      logger.info(`Camera ${device} ready`);
    } else {
      logger.warn("No camera found, select one through /api/cameras/select");
    }
  } catch (error) {
    logger.warn("Camera initialization failed, select a camera to retry", error);
  }

  logger.info("=== Camstation Backend Server Started Successfully ===");
}

export async function stopServer(): Promise<void> {
  if (!running) {
    logger.warn("Server not started");
    return;
  }

  const { app, manager, websocket, detachMedia } = running;
  running = null;
  logger.info("Stopping Camstation Backend Server...");

  // Consumers, then the session, then the surfaces that report on them
  await manager.shutdown();
  logger.info("Camera manager shut down");

  detachMedia?.();
  if (websocket) {
    await websocket.close();
    logger.info("WebSocket server closed");
  }

  await app.close();
  logger.info("Fastify app closed");

  closeDatabase();
  logger.info("Server stopped successfully");
}

// CLI mode (when run directly)
if (require.main === module) {
  const gracefulShutdown = async (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    try {
      await stopServer();
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Rejection:", { reason });
  });

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception:", error);
    process.exit(1);
  });

  startServer().catch((error) => {
    logger.error("Failed to start server:", error);
    process.exit(1);
  });
}
