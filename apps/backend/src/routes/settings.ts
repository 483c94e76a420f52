/**
 * Settings Routes
 * Persisted capture settings and the media index
 */

import fs from "fs/promises";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, HTTP_STATUS } from "@camstation/config";
import type {
  ApiResponse,
  CaptureKind,
  CaptureRecord,
  CaptureSettings,
  SaveSettingsRequest,
} from "@camstation/types";
import { createLogger } from "@camstation/utils";
import type { CameraManager } from "../camera/camera-manager";
import type { MediaLibrary } from "../services/media-library";
import { parseTimelapseOverride, type SettingsStore } from "../services/settings-store";
import { sendError } from "./helpers";

const logger = createLogger("settings-routes");

export interface SettingsRouteOptions {
  manager: CameraManager;
  settings: SettingsStore;
  media: MediaLibrary | null;
}

const CAPTURE_KINDS: CaptureKind[] = ["timelapse", "recording", "photo"];

/**
 * Untrusted body to a settings update; null when a given field is malformed
 */
export function parseSaveSettingsRequest(body: unknown): SaveSettingsRequest | null {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return null;
  }
  const raw: Record<string, unknown> = { ...body };
  const request: SaveSettingsRequest = {};

  for (const key of ["imageOutputDir", "videoOutputDir"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || !value) return null;
    request[key] = value;
  }
  if (raw.timelapseIntervalSeconds !== undefined) {
    const interval = raw.timelapseIntervalSeconds;
    if (typeof interval !== "number" || !(interval > 0)) return null;
    request.timelapseIntervalSeconds = interval;
  }
  if (raw.timelapseOverride === null) {
    request.timelapseOverride = null;
  } else if (raw.timelapseOverride !== undefined) {
    const override = parseTimelapseOverride(raw.timelapseOverride);
    if (!override) return null;
    request.timelapseOverride = override;
  }
  if (raw.snapshotCurrent !== undefined) {
    if (typeof raw.snapshotCurrent !== "boolean") return null;
    request.snapshotCurrent = raw.snapshotCurrent;
  }
  return request;
}

function parseCaptureKind(value: unknown): CaptureKind | undefined {
  return CAPTURE_KINDS.find((kind) => kind === value);
}

function parsePositiveInt(value: unknown): number | undefined {
  if (typeof value !== "string") return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 1 ? undefined : parsed;
}

export async function settingsRoutes(fastify: FastifyInstance, options: SettingsRouteOptions) {
  const { manager, settings, media } = options;

  /**
   * GET /api/settings
   */
  fastify.get(API_ENDPOINTS.SETTINGS, async (_request, reply: FastifyReply) => {
    const body: ApiResponse<CaptureSettings> = { success: true, data: settings.get() };
    return reply.code(HTTP_STATUS.OK).send(body);
  });

  /**
   * POST /api/settings
   * Body: SaveSettingsRequest. snapshotCurrent stores the live resolution
   * and control values as the timelapse override.
   */
  fastify.post(API_ENDPOINTS.SETTINGS, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseSaveSettingsRequest(request.body);
    if (!body) {
      return reply.code(HTTP_STATUS.BAD_REQUEST).send({
        success: false,
        error: "Invalid settings",
        message: "Output directories must be non-empty strings and the interval positive",
      });
    }

    try {
      const update: Partial<CaptureSettings> = {
        imageOutputDir: body.imageOutputDir,
        videoOutputDir: body.videoOutputDir,
        timelapseIntervalSeconds: body.timelapseIntervalSeconds,
        timelapseOverride: body.timelapseOverride,
      };

      if (body.snapshotCurrent) {
        const { session } = manager.requireActive("snapshot_settings");
        const resolution = session.getCurrentResolution();
        update.timelapseOverride = {
          ...(resolution ? { resolution } : {}),
          controls: session.getAllCurrentValues(),
        };
      }

      for (const dir of [update.imageOutputDir, update.videoOutputDir]) {
        if (dir) {
          await fs.mkdir(dir, { recursive: true });
        }
      }

      const saved = settings.save(update);
      manager.setOutputDirs({
        timelapse: saved.imageOutputDir,
        videos: saved.videoOutputDir,
      });

      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        message: "Settings saved",
        data: saved,
      });
    } catch (error) {
      return sendError(reply, logger, "Save settings", error);
    }
  });

  /**
   * GET /api/captures?kind=&page=&limit=
   */
  fastify.get(
    API_ENDPOINTS.CAPTURES,
    async (
      request: FastifyRequest<{ Querystring: Record<string, string | undefined> }>,
      reply: FastifyReply,
    ) => {
      if (!media) {
        return reply.code(HTTP_STATUS.SERVICE_UNAVAILABLE).send({
          success: false,
          error: "Media index unavailable",
          message: "The database is not initialized",
        });
      }

      const captures = media.list({
        kind: parseCaptureKind(request.query.kind),
        page: parsePositiveInt(request.query.page),
        limit: parsePositiveInt(request.query.limit),
      });
      const body: ApiResponse<CaptureRecord[]> = { success: true, data: captures };
      return reply.code(HTTP_STATUS.OK).send(body);
    },
  );
}
