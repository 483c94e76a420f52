/**
 * Camera Routes
 * Status, live preview, resolution, reinitialization and still capture for
 * the active camera
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, CAMERA_DEFAULTS, ERROR_MESSAGES, HTTP_STATUS } from "@camstation/config";
import type { SetResolutionRequest } from "@camstation/types";
import { createLogger, sleep } from "@camstation/utils";
import { sendError, type CameraRouteOptions } from "./helpers";

const logger = createLogger("camera-routes");

/** How long one preview wait blocks before re-checking the connection */
const PREVIEW_WAIT_MS = 1000;
const SNAPSHOT_WAIT_MS = 2000;

const resolutionSchema = {
  body: {
    type: "object",
    required: ["width", "height"],
    properties: {
      width: { type: "integer", minimum: 1 },
      height: { type: "integer", minimum: 1 },
      format: { type: "string", minLength: 1 },
    },
  },
} as const;

function requestedFilePath(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null || !("filePath" in body)) {
    return undefined;
  }
  const { filePath } = body;
  return typeof filePath === "string" && filePath.length > 0 ? filePath : undefined;
}

export async function cameraRoutes(fastify: FastifyInstance, options: CameraRouteOptions) {
  const { manager } = options;

  /**
   * GET /api/camera/status
   * Session status with controls and defaults maps
   */
  fastify.get(API_ENDPOINTS.CAMERA_STATUS, async (_request, reply: FastifyReply) => {
    const status = manager.getStatus();
    const active = manager.getActive();

    return reply.code(HTTP_STATUS.OK).send({
      success: true,
      data: {
        ...status,
        health: manager.getHealth(),
        controls: active ? active.session.listControls() : [],
        storedDefaults: active ? active.session.getStoredDefaults() : {},
        originalHardwareDefaults: active ? active.session.getOriginalHardwareDefaults() : {},
      },
    });
  });

  /**
   * GET /api/camera/preview
   * MJPEG stream of the live preview
   */
  fastify.get(API_ENDPOINTS.CAMERA_PREVIEW, async (request: FastifyRequest, reply: FastifyReply) => {
    if (!manager.getActive()) {
      return reply.code(HTTP_STATUS.SERVICE_UNAVAILABLE).send({
        success: false,
        error: ERROR_MESSAGES.CAMERA_NOT_INITIALIZED,
      });
    }

    reply.hijack();
    const res = reply.raw;
    res.writeHead(HTTP_STATUS.OK, {
      "Content-Type": "multipart/x-mixed-replace; boundary=frame",
      "Cache-Control": "no-cache, no-store, must-revalidate",
      Connection: "keep-alive",
      Pragma: "no-cache",
      Expires: "0",
    });

    let closed = false;
    request.raw.on("close", () => {
      closed = true;
    });
    logger.info("Preview client connected", { ip: request.ip });

    let lastSequence = -1;
    let framesSent = 0;
    while (!closed && !res.writableEnded) {
      const active = manager.getActive();
      if (!active || !active.preview.isRunning()) {
        break;
      }

      const frame = await active.preview.waitForFrame(lastSequence, PREVIEW_WAIT_MS);
      if (!frame || closed) {
        continue;
      }
      lastSequence = frame.sequence;

      // Slow client: skip frames instead of buffering them
      if (!res.writableNeedDrain) {
        res.write(
          `--frame\r\nContent-Type: image/jpeg\r\nContent-Length: ${frame.data.length}\r\n\r\n`,
        );
        res.write(frame.data);
        res.write("\r\n");
        framesSent += 1;
      }
      await sleep(CAMERA_DEFAULTS.PREVIEW_FRAME_INTERVAL_MS);
    }

    if (!res.writableEnded) {
      res.end();
    }
    logger.info("Preview client disconnected", { ip: request.ip, framesSent });
  });

  /**
   * GET /api/camera/snapshot
   * Latest preview frame as a single JPEG
   */
  fastify.get(API_ENDPOINTS.CAMERA_SNAPSHOT, async (_request, reply: FastifyReply) => {
    const active = manager.getActive();
    if (!active) {
      return reply.code(HTTP_STATUS.SERVICE_UNAVAILABLE).send({
        success: false,
        error: ERROR_MESSAGES.CAMERA_NOT_INITIALIZED,
      });
    }

    const frame = await active.preview.waitForFrame(-1, SNAPSHOT_WAIT_MS);
    if (!frame) {
      return reply.code(HTTP_STATUS.SERVICE_UNAVAILABLE).send({
        success: false,
        error: ERROR_MESSAGES.PREVIEW_UNAVAILABLE,
      });
    }

    return reply
      .code(HTTP_STATUS.OK)
      .header("Content-Type", "image/jpeg")
      .header("Cache-Control", "no-cache")
      .send(frame.data);
  });

  /**
   * GET /api/camera/resolution
   */
  fastify.get(API_ENDPOINTS.CAMERA_RESOLUTION, async (_request, reply: FastifyReply) => {
    try {
      const { session } = manager.requireActive("get_resolution");
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        data: {
          current: session.getCurrentResolution(),
          supported: session.getSupportedFormats(),
          locked: session.isResolutionHeld(),
        },
      });
    } catch (error) {
      return sendError(reply, logger, "Get resolution", error);
    }
  });

  /**
   * POST /api/camera/resolution
   * Body: { width, height, format? }. The format defaults to the current one.
   */
  fastify.post(
    API_ENDPOINTS.CAMERA_RESOLUTION,
    { schema: resolutionSchema },
    async (request: FastifyRequest<{ Body: SetResolutionRequest }>, reply: FastifyReply) => {
      try {
        const { session } = manager.requireActive("set_resolution");
        const { width, height } = request.body;
        const format =
          request.body.format ?? session.getCurrentResolution()?.format ?? CAMERA_DEFAULTS.FORMAT;

        const result = await session.setResolution(width, height, format);
        return reply
          .code(result.success ? HTTP_STATUS.OK : HTTP_STATUS.CONFLICT)
          .send({ success: result.success, message: result.message });
      } catch (error) {
        return sendError(reply, logger, "Set resolution", error);
      }
    },
  );

  /**
   * POST /api/camera/reinitialize
   * Release and reopen the device
   */
  fastify.post(API_ENDPOINTS.CAMERA_REINITIALIZE, async (_request, reply: FastifyReply) => {
    try {
      const { session } = manager.requireActive("reinitialize");
      await session.reinitialize();
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        message: "Camera reinitialized",
        data: { resolution: session.getCurrentResolution() },
      });
    } catch (error) {
      return sendError(reply, logger, "Reinitialize", error);
    }
  });

  /**
   * POST /api/camera/capture
   * Body: { filePath? }. Rate limited.
   */
  fastify.post(
    API_ENDPOINTS.CAMERA_CAPTURE,
    { config: { rateLimit: { max: 20, timeWindow: "1 minute" } } },
    async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const photo = await manager.capturePhoto(requestedFilePath(request.body));
        return reply.code(HTTP_STATUS.CREATED).send({ success: true, data: photo });
      } catch (error) {
        return sendError(reply, logger, "Capture photo", error);
      }
    },
  );
}
