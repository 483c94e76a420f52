/**
 * Camera Device Routes
 * Discovery and selection of the active camera
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, HTTP_STATUS } from "@camstation/config";
import { createLogger } from "@camstation/utils";
import { sendError, type CameraRouteOptions } from "./helpers";

const logger = createLogger("camera-device-routes");

const selectSchema = {
  body: {
    type: "object",
    required: ["device"],
    properties: {
      device: { type: "string", minLength: 1 },
    },
  },
} as const;

export async function cameraDeviceRoutes(fastify: FastifyInstance, options: CameraRouteOptions) {
  const { manager } = options;

  /**
   * GET /api/cameras
   * List capture devices
   */
  fastify.get(API_ENDPOINTS.CAMERAS, async (_request, reply: FastifyReply) => {
    try {
      const cameras = await manager.discoverCameras();
      const activePath = manager.getActive()?.session.devicePath ?? null;
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        data: cameras.map((camera) => ({ ...camera, active: camera.path === activePath })),
      });
    } catch (error) {
      return sendError(reply, logger, "List cameras", error);
    }
  });

  /**
   * POST /api/cameras/select
   * Body: { device }. Closes the active camera, then opens the selected one.
   */
  fastify.post(
    API_ENDPOINTS.CAMERAS_SELECT,
    { schema: selectSchema },
    async (request: FastifyRequest<{ Body: { device: string } }>, reply: FastifyReply) => {
      const { device } = request.body;
      try {
        await manager.switchCamera(device);
        logger.info(`Camera ${device} selected`);
        return reply.code(HTTP_STATUS.OK).send({
          success: true,
          message: `Camera ${device} is now active`,
          data: manager.getStatus(),
        });
      } catch (error) {
        return sendError(reply, logger, `Select camera ${device}`, error);
      }
    },
  );
}
