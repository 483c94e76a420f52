/**
 * Test setup
 *
 * Silences the camera logger for every suite. Assertions that need log
 * output spy on the mocked methods instead.
 */

import { vi } from "vitest";

vi.mock("../logger", () => ({
  cameraLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));
