/**
 * Capture Mode Routes
 * Timelapse sampler and video recorder of the active camera
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, HTTP_STATUS } from "@camstation/config";
import type { RecordingStartRequest, TimelapseStartRequest } from "@camstation/types";
import { createLogger } from "@camstation/utils";
import { parseTimelapseOverride } from "../services/settings-store";
import { sendError, type CameraRouteOptions } from "./helpers";

const logger = createLogger("capture-routes");

function readBody(body: unknown): Record<string, unknown> {
  return typeof body === "object" && body !== null && !Array.isArray(body) ? { ...body } : {};
}

/**
 * Untrusted body to a timelapse request; null when a given field is malformed
 */
export function parseTimelapseRequest(body: unknown): TimelapseStartRequest | null {
  const raw = readBody(body);
  const request: TimelapseStartRequest = {};

  if (raw.intervalSeconds !== undefined) {
    if (typeof raw.intervalSeconds !== "number" || !(raw.intervalSeconds > 0)) return null;
    request.intervalSeconds = raw.intervalSeconds;
  }
  if (raw.outputDir !== undefined) {
    if (typeof raw.outputDir !== "string" || !raw.outputDir) return null;
    request.outputDir = raw.outputDir;
  }
  if (raw.override !== undefined && raw.override !== null) {
    const override = parseTimelapseOverride(raw.override);
    if (!override) return null;
    request.override = override;
  }
  return request;
}

/**
 * Untrusted body to a recording request; null when a given field is malformed
 */
export function parseRecordingRequest(body: unknown): RecordingStartRequest | null {
  const raw = readBody(body);
  const request: RecordingStartRequest = {};

  if (raw.filename !== undefined) {
    if (typeof raw.filename !== "string" || !raw.filename) return null;
    request.filename = raw.filename;
  }
  if (raw.fps !== undefined) {
    if (typeof raw.fps !== "number" || !(raw.fps > 0)) return null;
    request.fps = raw.fps;
  }
  return request;
}

export async function captureRoutes(fastify: FastifyInstance, options: CameraRouteOptions) {
  const { manager } = options;

  // ==========================================================================
  // Timelapse
  // ==========================================================================

  fastify.post(API_ENDPOINTS.TIMELAPSE_START, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseTimelapseRequest(request.body);
    if (!body) {
      return reply.code(HTTP_STATUS.BAD_REQUEST).send({
        success: false,
        error: "Invalid timelapse request",
        message: "intervalSeconds must be positive; outputDir and override must be well formed",
      });
    }

    try {
      const status = await manager.startTimelapse(body);
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        message: `Timelapse running every ${status.intervalSeconds}s`,
        data: status,
      });
    } catch (error) {
      return sendError(reply, logger, "Start timelapse", error);
    }
  });

  fastify.post(API_ENDPOINTS.TIMELAPSE_STOP, async (_request, reply: FastifyReply) => {
    try {
      const status = await manager.stopTimelapse();
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        message: "Timelapse stopped",
        data: status,
      });
    } catch (error) {
      return sendError(reply, logger, "Stop timelapse", error);
    }
  });

  fastify.get(API_ENDPOINTS.TIMELAPSE_STATUS, async (_request, reply: FastifyReply) => {
    return reply.code(HTTP_STATUS.OK).send({
      success: true,
      data: manager.getStatus().timelapse,
    });
  });

  // ==========================================================================
  // Recording
  // ==========================================================================

  fastify.post(API_ENDPOINTS.RECORDING_START, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseRecordingRequest(request.body);
    if (!body) {
      return reply.code(HTTP_STATUS.BAD_REQUEST).send({
        success: false,
        error: "Invalid recording request",
        message: "filename must be a non-empty string and fps positive",
      });
    }

    try {
      const outputPath = await manager.startRecording(body);
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        message: `Recording to ${outputPath}`,
        data: { outputPath },
      });
    } catch (error) {
      return sendError(reply, logger, "Start recording", error);
    }
  });

  fastify.post(API_ENDPOINTS.RECORDING_STOP, async (_request, reply: FastifyReply) => {
    try {
      const outputPath = await manager.stopRecording();
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        message: outputPath ? `Recording saved to ${outputPath}` : "Not recording",
        data: { outputPath },
      });
    } catch (error) {
      return sendError(reply, logger, "Stop recording", error);
    }
  });

  fastify.get(API_ENDPOINTS.RECORDING_STATUS, async (_request, reply: FastifyReply) => {
    return reply.code(HTTP_STATUS.OK).send({
      success: true,
      data: manager.getStatus().recording,
    });
  });
}
