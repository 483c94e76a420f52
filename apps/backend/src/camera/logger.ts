import { createLogger } from "@camstation/utils";

/**
 * Camera module logger
 * Shared by the device session, the frame hub and every consumer
 */
export const cameraLogger = createLogger("camera");
