/**
 * Node.js-specific configuration constants
 * Fixed directories created at startup. Paths that .env may override are
 * read in the backend's env module, after dotenv has loaded.
 */

import { FILE_PATHS } from "./index";

// ============================================================================
// Paths Configuration
// ============================================================================

export const PATHS = {
  /** Log files */
  LOGS: FILE_PATHS.LOGS_DIR,
  /** Data directory root */
  DATA: FILE_PATHS.DATA_DIR,
} as const;
