import Fastify from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { APP_CONFIG, API_ENDPOINTS, HTTP_STATUS } from "@camstation/config";
import type { HealthCheckResponse } from "@camstation/types";
import { createLogger } from "@camstation/utils";
import { env } from "./config/env";
import type { CameraManager } from "./camera/camera-manager";
import type { SettingsStore } from "./services/settings-store";
import type { MediaLibrary } from "./services/media-library";
import { cameraRoutes } from "./routes/camera";
import { controlRoutes } from "./routes/controls";
import { cameraDeviceRoutes } from "./routes/cameras";
import { captureRoutes } from "./routes/capture";
import { settingsRoutes } from "./routes/settings";

const logger = createLogger("app");

export interface AppDependencies {
  manager: CameraManager;
  settings: SettingsStore;
  media: MediaLibrary | null;
}

/**
 * Create and configure the Fastify application
 *
 * ROUTES MANIFEST:
 * =================
 *   GET    /health                          - Service health check
 *
 * Devices:
 *   GET    /api/cameras                     - Discover capture devices
 *   POST   /api/cameras/select              - Switch the active camera
 *
 * Active camera:
 *   GET    /api/camera/status               - Session status, controls, defaults
 *   GET    /api/camera/preview              - Live MJPEG stream
 *   GET    /api/camera/snapshot             - Current preview JPEG
 *   GET    /api/camera/resolution           - Current and supported formats
 *   POST   /api/camera/resolution           - Change resolution
 *   POST   /api/camera/reinitialize         - Reopen the device
 *   POST   /api/camera/capture              - Still photo (rate limited)
 *   GET    /api/camera/controls             - Controls and current values
 *   POST   /api/camera/controls             - Set one control
 *   POST   /api/camera/controls/reset       - Restore stored defaults
 *
 * Capture modes:
 *   POST   /api/timelapse/start|stop        - Timelapse sampler
 *   GET    /api/timelapse/status
 *   POST   /api/recording/start|stop        - Video recorder
 *   GET    /api/recording/status
 *
 * Persistence:
 *   GET    /api/settings                    - Capture settings
 *   POST   /api/settings                    - Save capture settings
 *   GET    /api/captures                    - Media index
 *
 * WebSocket:
 *   WS     /ws/camera                       - Real-time camera events
 */
export async function createApp(deps: AppDependencies) {
  const app = Fastify({
    logger: false, // We use Winston instead
    trustProxy: true,
  });

  // Register rate limit plugin (global limit off, capture route opts in)
  await app.register(rateLimit, {
    global: false,
    errorResponseBuilder: (_request, context) => {
      return {
        statusCode: context.statusCode,
        success: false,
        error: "Too Many Requests",
        message: `Rate limit exceeded. Try again in ${context.after}`,
      };
    },
  });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  // Register routes
  const cameraOptions = { manager: deps.manager };
  await app.register(cameraDeviceRoutes, cameraOptions);
  await app.register(cameraRoutes, cameraOptions);
  await app.register(controlRoutes, cameraOptions);
  await app.register(captureRoutes, cameraOptions);
  await app.register(settingsRoutes, {
    manager: deps.manager,
    settings: deps.settings,
    media: deps.media,
  });

  // Health check endpoint
  app.get(API_ENDPOINTS.HEALTH, async () => {
    const health: HealthCheckResponse & { environment: string; version: string } = {
      status: "ok",
      uptime: process.uptime(),
      cameraConnected: deps.manager.isConnected(),
      environment: env.nodeEnv,
      version: APP_CONFIG.APP_VERSION,
    };
    return health;
  });

  // Error handler
  app.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.status(HTTP_STATUS.BAD_REQUEST).send({
        success: false,
        error: "Validation failed",
        message: error.message,
      });
    }

    const statusCode = error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    if (statusCode >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
      logger.error("Request error:", {
        error: error.message,
        stack: error.stack,
        url: request.url,
        method: request.method,
      });
    }

    return reply.status(statusCode).send({
      success: false,
      error: error.name || "Internal Server Error",
      message: error.message || "An unexpected error occurred",
    });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.status(HTTP_STATUS.NOT_FOUND).send({
      success: false,
      error: "Not Found",
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
}
