/**
 * Environment Configuration Tests
 *
 * Loads the env module fresh from a working directory holding a .env file.
 *
 * Source: apps/backend/src/config/env.ts
 *
 * Critical Invariants:
 * - Every key in .env is read after dotenv has loaded, paths included
 * - Missing keys fall back to the shared defaults
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const KEYS = [
  "CAPTURE_FPS",
  "DATABASE_PATH",
  "TIMELAPSE_OUTPUT_PATH",
  "VIDEO_OUTPUT_PATH",
  "PHOTO_OUTPUT_PATH",
];

describe("env", () => {
  const originalCwd = process.cwd();
  const saved = new Map<string, string | undefined>();
  let dir: string;

  beforeEach(async () => {
    for (const key of KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "camstation-env-"));
    process.chdir(dir);
    vi.resetModules();
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads paths from the .env file", async () => {
    await fs.writeFile(
      path.join(dir, ".env"),
      [
        "CAPTURE_FPS=7",
        "DATABASE_PATH=/srv/camstation/db.sqlite",
        "TIMELAPSE_OUTPUT_PATH=/srv/camstation/timelapse",
        "VIDEO_OUTPUT_PATH=/srv/camstation/videos",
        "PHOTO_OUTPUT_PATH=/srv/camstation/photos",
      ].join("\n"),
    );

    const { env } = await import("../env");

    expect(env).toMatchObject({
      captureFps: 7,
      databasePath: "/srv/camstation/db.sqlite",
      timelapseOutputPath: "/srv/camstation/timelapse",
      videoOutputPath: "/srv/camstation/videos",
      photoOutputPath: "/srv/camstation/photos",
    });
  });

  it("falls back to the default paths", async () => {
    const { env } = await import("../env");

    expect(env).toMatchObject({
      captureFps: 15,
      databasePath: "./data/camstation.db",
      timelapseOutputPath: "./data/timelapse",
      videoOutputPath: "./data/videos",
      photoOutputPath: "./data/photos",
    });
  });
});
