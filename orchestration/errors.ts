export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class OutOfRangeError extends ValidationError {
  constructor(
    readonly index: number,
    readonly size: number,
  ) {
    super(
      size === 0
        ? `Index ${String(index)} is out of range (store is empty)`
        : `Index ${String(index)} is out of range (0..${String(size - 1)})`,
    );
    this.name = "OutOfRangeError";
  }
}

export class TriggerNotFoundError extends Error {
  constructor(readonly triggerId: string) {
    super(`Trigger not found: ${triggerId}`);
    this.name = "TriggerNotFoundError";
  }
}

export type ResourceErrorReason = "missing" | "invalid";

export class ResourceError extends Error {
  constructor(
    message: string,
    readonly resourcePath: string,
    readonly reason: ResourceErrorReason = "invalid",
  ) {
    super(message);
    this.name = "ResourceError";
  }
}

export class PlaybackError extends Error {
  constructor(
    message: string,
    readonly resourceRef: string,
  ) {
    super(message);
    this.name = "PlaybackError";
  }
}

export class InterruptSignal extends Error {
  constructor() {
    super("Interrupted by user");
    this.name = "InterruptSignal";
  }
}
