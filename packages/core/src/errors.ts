/**
 * Handle Error Types
 *
 * One class per failure kind, so callers can branch with `instanceof`
 * or on the stable `code` string.
 */

export type HandleErrorCode = "null-handle" | "native-status" | "downcast" | "unbound";

/**
 * Base class for every error raised by handlekit.
 */
export class HandleError extends Error {
  constructor(
    message: string,
    public readonly code: HandleErrorCode
  ) {
    super(message);
    this.name = "HandleError";
  }
}

/**
 * Thrown when a null raw handle reaches the safe construction entry point.
 *
 * This is a contract violation by the caller or the native environment
 * (usually a failed native constructor), never a recoverable condition.
 */
export class NullHandleError extends HandleError {
  constructor(readonly elementName: string) {
    super(
      `Failed to create ${elementName} from raw handle because the handle is null.`,
      "null-handle"
    );
    this.name = "NullHandleError";
  }
}

/** Native operations that report success through a status code. */
export type StatusOperation = "map" | "show";

/**
 * A native call reported failure through its status code.
 *
 * Returned inside a `Result`; the core never throws it.
 */
export class NativeStatusError extends HandleError {
  constructor(
    readonly operation: StatusOperation,
    readonly status: number,
    readonly handle: string
  ) {
    super(`Native ${operation} failed for ${handle} (status ${status})`, "native-status");
    this.name = "NativeStatusError";
  }
}

/** Thrown by the throwing `downcast` when the live class name does not match. */
export class DowncastError extends HandleError {
  constructor(
    readonly expected: string,
    readonly actual: string,
    readonly handle: string
  ) {
    super(`Cannot downcast ${handle}: expected class "${expected}", found "${actual}"`, "downcast");
    this.name = "DowncastError";
  }
}

/** Thrown when the native object system is used before one has been bound. */
export class UnboundNativeSystemError extends HandleError {
  constructor() {
    super("No native object system is bound. Call bindNativeSystem() first.", "unbound");
    this.name = "UnboundNativeSystemError";
  }
}
