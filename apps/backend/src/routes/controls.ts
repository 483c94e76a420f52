/**
 * Control Routes
 * Hardware controls of the active camera
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, HTTP_STATUS } from "@camstation/config";
import type { CameraControlsResponse, SetControlRequest } from "@camstation/types";
import { createLogger } from "@camstation/utils";
import { ControlApplyFailedError } from "../camera/errors";
import { sendError, type CameraRouteOptions } from "./helpers";

const logger = createLogger("control-routes");

const setControlSchema = {
  body: {
    type: "object",
    required: ["name", "value"],
    properties: {
      name: { type: "string", minLength: 1 },
      value: { type: "number" },
    },
  },
} as const;

export async function controlRoutes(fastify: FastifyInstance, options: CameraRouteOptions) {
  const { manager } = options;

  /**
   * GET /api/camera/controls
   */
  fastify.get(API_ENDPOINTS.CAMERA_CONTROLS, async (_request, reply: FastifyReply) => {
    try {
      const { session } = manager.requireActive("list_controls");
      const data: CameraControlsResponse = {
        controls: session.listControls(),
        values: session.getAllCurrentValues(),
        storedDefaults: session.getStoredDefaults(),
        originalHardwareDefaults: session.getOriginalHardwareDefaults(),
      };
      return reply.code(HTTP_STATUS.OK).send({ success: true, data });
    } catch (error) {
      return sendError(reply, logger, "List controls", error);
    }
  });

  /**
   * POST /api/camera/controls
   * Body: { name, value }
   */
  fastify.post(
    API_ENDPOINTS.CAMERA_CONTROLS,
    { schema: setControlSchema },
    async (request: FastifyRequest<{ Body: SetControlRequest }>, reply: FastifyReply) => {
      try {
        const { session } = manager.requireActive("set_control");
        const { name, value } = request.body;
        const result = await session.setControlValue(name, value);

        if (result.success) {
          return reply.code(HTTP_STATUS.OK).send({ success: true, message: result.message });
        }
        const status =
          result.error instanceof ControlApplyFailedError
            ? HTTP_STATUS.UNPROCESSABLE_ENTITY
            : HTTP_STATUS.BAD_REQUEST;
        return reply.code(status).send({
          success: false,
          error: result.error?.name,
          message: result.message,
        });
      } catch (error) {
        return sendError(reply, logger, "Set control", error);
      }
    },
  );

  /**
   * POST /api/camera/controls/reset
   * Write stored defaults, then reinitialize
   */
  fastify.post(API_ENDPOINTS.CAMERA_CONTROLS_RESET, async (_request, reply: FastifyReply) => {
    try {
      const { session } = manager.requireActive("reset_controls");
      const result = await session.resetToStoredDefaults();
      return reply.code(HTTP_STATUS.OK).send({
        success: result.success,
        message: result.message,
        data: { failed: result.failed, values: session.getAllCurrentValues() },
      });
    } catch (error) {
      return sendError(reply, logger, "Reset controls", error);
    }
  });
}
