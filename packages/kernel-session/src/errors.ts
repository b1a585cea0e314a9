export type KernelSessionErrorCode =
  | "KERNEL_DISCONNECTED"
  | "KERNEL_UNRESPONSIVE"
  | "KERNEL_START_FAILED"
  | "KERNEL_NOT_CONNECTED";

export class KernelSessionError extends Error {
  constructor(
    public readonly code: KernelSessionErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "KernelSessionError";
  }
}

export class KernelDisconnectedError extends KernelSessionError {
  constructor(message = "Kernel disconnected", options?: { cause?: unknown }) {
    super("KERNEL_DISCONNECTED", message, options);
    this.name = "KernelDisconnectedError";
  }
}

export class KernelUnresponsiveError extends KernelSessionError {
  constructor(message = "Kernel is not responding") {
    super("KERNEL_UNRESPONSIVE", message);
    this.name = "KernelUnresponsiveError";
  }
}

export class KernelStartError extends KernelSessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("KERNEL_START_FAILED", message, options);
    this.name = "KernelStartError";
  }
}
