// Error taxonomy. Everything the engine throws is a GpuError, and all of it
// happens at setup time: constructors, builders and scheduler start-up.

export type ShaderStage = "vertex" | "fragment";
export type BindingKind = "attribute" | "uniform";

export class GpuError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ShaderCompileError extends GpuError {
  constructor(readonly stage: ShaderStage, readonly diagnostic: string) {
    super(`${stage} shader compile error:\n${diagnostic}`);
  }
}

export class ShaderLinkError extends GpuError {
  constructor(readonly diagnostic: string) {
    super(`Program link error:\n${diagnostic}`);
  }
}

export class UnknownBindingError extends GpuError {
  constructor(readonly binding: string, readonly kind: BindingKind) {
    super(`Unknown ${kind} "${binding}"`);
  }
}

export class BufferAllocationError extends GpuError {
  constructor(readonly resource: "buffer" | "vertex array") {
    super(`Failed to create ${resource}`);
  }
}

export class SchedulerInitError extends GpuError {}

/** A record layout or attribute binding that does not fit the record. */
export class LayoutError extends GpuError {}
