/**
 * Shared route helpers: camera error to HTTP mapping
 */

import type { FastifyReply } from "fastify";
import type { ApiResponse } from "@camstation/types";
import { ERROR_MESSAGES, HTTP_STATUS } from "@camstation/config";
import type { Logger } from "@camstation/utils";
import {
  CameraError,
  CameraNotInitializedError,
  CaptureTimeoutError,
  ControlOutOfRangeError,
  DeviceUnavailableError,
  UnknownControlError,
  toError,
} from "../camera/errors";
import type { CameraManager } from "../camera/camera-manager";

export interface CameraRouteOptions {
  manager: CameraManager;
}

function statusFor(error: Error): number {
  if (error instanceof CameraNotInitializedError || error instanceof CaptureTimeoutError) {
    return HTTP_STATUS.SERVICE_UNAVAILABLE;
  }
  if (
    error instanceof UnknownControlError ||
    error instanceof ControlOutOfRangeError ||
    error instanceof RangeError
  ) {
    return HTTP_STATUS.BAD_REQUEST;
  }
  if (error instanceof DeviceUnavailableError) {
    return HTTP_STATUS.NOT_FOUND;
  }
  return HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

/**
 * Reply with the envelope for a failed operation
 */
export function sendError(
  reply: FastifyReply,
  logger: Logger,
  action: string,
  error: unknown,
): FastifyReply {
  const err = toError(error);
  const status = statusFor(err);
  if (status >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
    logger.error(`${action} failed`, err instanceof CameraError ? err.toJSON() : { error: err.message });
  } else {
    logger.warn(`${action} rejected: ${err.message}`);
  }

  const body: ApiResponse = {
    success: false,
    error: err instanceof CameraNotInitializedError ? ERROR_MESSAGES.CAMERA_NOT_INITIALIZED : err.name,
    message: err.message,
  };
  return reply.code(status).send(body);
}
