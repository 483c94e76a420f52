/**
 * Camera Error Types
 *
 * Typed error hierarchy for the camera module.
 * All errors include structured context for debugging.
 */

// ============================================================================
// Error Context Types
// ============================================================================

export interface CameraErrorContext {
  /** Operation being performed when error occurred */
  operation: string;
  /** Device node the operation targeted */
  devicePath?: string;
  /** Session state at time of error */
  sessionState?: string;
  /** Error timestamp (ISO string) */
  timestamp: string;
  /** Stack trace */
  stack?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

type ErrorContextInput = Partial<Omit<CameraErrorContext, "timestamp">>;

// ============================================================================
// Base Camera Error
// ============================================================================

export class CameraError extends Error {
  public readonly context: CameraErrorContext;
  public readonly timestamp: string;

  constructor(
    message: string,
    context: Partial<CameraErrorContext> & { operation: string },
  ) {
    super(message);
    this.name = "CameraError";
    this.timestamp = new Date().toISOString();
    this.context = {
      ...context,
      operation: context.operation,
      timestamp: context.timestamp || this.timestamp,
      stack: context.stack || this.stack,
    };

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, CameraError.prototype);
  }

  /**
   * Get formatted error details for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Device Errors
// ============================================================================

export class DeviceUnavailableError extends CameraError {
  constructor(devicePath: string, reason: string, context?: ErrorContextInput) {
    super(`Device ${devicePath} unavailable: ${reason}`, {
      operation: context?.operation || "open",
      ...context,
      devicePath,
    });
    this.name = "DeviceUnavailableError";
    Object.setPrototypeOf(this, DeviceUnavailableError.prototype);
  }
}

export class NoSupportedFormatsError extends CameraError {
  constructor(devicePath: string, context?: ErrorContextInput) {
    super(`No supported capture formats found for ${devicePath}`, {
      operation: context?.operation || "list_formats",
      ...context,
      devicePath,
    });
    this.name = "NoSupportedFormatsError";
    Object.setPrototypeOf(this, NoSupportedFormatsError.prototype);
  }
}

export class NoControlsFoundError extends CameraError {
  constructor(devicePath: string, context?: ErrorContextInput) {
    super(`No usable controls found for ${devicePath}`, {
      operation: context?.operation || "list_controls",
      ...context,
      devicePath,
    });
    this.name = "NoControlsFoundError";
    Object.setPrototypeOf(this, NoControlsFoundError.prototype);
  }
}

export class CameraNotInitializedError extends CameraError {
  constructor(operation: string) {
    super("Camera not initialized", { operation });
    this.name = "CameraNotInitializedError";
    Object.setPrototypeOf(this, CameraNotInitializedError.prototype);
  }
}

export class ReinitializationFailedError extends CameraError {
  public readonly originalError: Error;

  constructor(devicePath: string, cause: Error, context?: ErrorContextInput) {
    super(`Reinitialization of ${devicePath} failed: ${cause.message}`, {
      operation: context?.operation || "reinitialize",
      ...context,
      devicePath,
    });
    this.name = "ReinitializationFailedError";
    this.originalError = cause;
    Object.setPrototypeOf(this, ReinitializationFailedError.prototype);
  }
}

/**
 * A backend command line tool (v4l2-ctl, ffmpeg) exited with an error
 */
export class DeviceCommandError extends CameraError {
  public readonly command: string;
  public readonly stderr: string;

  constructor(command: string, stderr: string, context?: ErrorContextInput) {
    super(`Command '${command}' failed: ${stderr.trim() || "no output"}`, {
      operation: context?.operation || "device_command",
      ...context,
    });
    this.name = "DeviceCommandError";
    this.command = command;
    this.stderr = stderr;
    Object.setPrototypeOf(this, DeviceCommandError.prototype);
  }
}

// ============================================================================
// Control Errors
// ============================================================================

export class UnknownControlError extends CameraError {
  public readonly controlName: string;

  constructor(controlName: string, context?: ErrorContextInput) {
    super(`Unknown control: ${controlName}`, {
      operation: context?.operation || "set_control",
      ...context,
    });
    this.name = "UnknownControlError";
    this.controlName = controlName;
    Object.setPrototypeOf(this, UnknownControlError.prototype);
  }
}

export class ControlOutOfRangeError extends CameraError {
  public readonly controlName: string;
  public readonly value: number;

  constructor(
    controlName: string,
    value: number,
    min: number,
    max: number,
    context?: ErrorContextInput,
  ) {
    super(
      Number.isInteger(value)
        ? `Value ${value} for ${controlName} is outside [${min}, ${max}]`
        : `Value ${value} for ${controlName} is not an integer`,
      {
        operation: context?.operation || "set_control",
        ...context,
        metadata: { ...context?.metadata, min, max },
      },
    );
    this.name = "ControlOutOfRangeError";
    this.controlName = controlName;
    this.value = value;
    Object.setPrototypeOf(this, ControlOutOfRangeError.prototype);
  }
}

export class ControlApplyFailedError extends CameraError {
  public readonly controlName: string;
  public readonly value: number;

  constructor(
    controlName: string,
    value: number,
    detail: string | undefined,
    context?: ErrorContextInput,
  ) {
    super(
      `Failed to set ${controlName}=${value}${detail ? `: ${detail}` : ""}`,
      {
        operation: context?.operation || "set_control",
        ...context,
      },
    );
    this.name = "ControlApplyFailedError";
    this.controlName = controlName;
    this.value = value;
    Object.setPrototypeOf(this, ControlApplyFailedError.prototype);
  }
}

// ============================================================================
// Consumer Errors
// ============================================================================

export class WriterOpenFailedError extends CameraError {
  public readonly outputPath: string;

  constructor(outputPath: string, reason: string, context?: ErrorContextInput) {
    super(`Failed to open video writer for ${outputPath}: ${reason}`, {
      operation: context?.operation || "recording_start",
      ...context,
    });
    this.name = "WriterOpenFailedError";
    this.outputPath = outputPath;
    Object.setPrototypeOf(this, WriterOpenFailedError.prototype);
  }
}

export class CaptureTimeoutError extends CameraError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: ErrorContextInput) {
    super(`No frame received within ${timeoutMs}ms`, {
      operation: context?.operation || "capture",
      ...context,
    });
    this.name = "CaptureTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, CaptureTimeoutError.prototype);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Errors that come from caller input rather than the device
 */
export function isValidationError(error: unknown): boolean {
  return (
    error instanceof UnknownControlError ||
    error instanceof ControlOutOfRangeError
  );
}
