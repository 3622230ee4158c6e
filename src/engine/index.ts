export { GL, bufferTarget, bufferUsage } from "./GpuContext";
export type { GpuContext, BufferKind, BufferUsage } from "./GpuContext";
export { ShaderProgram } from "./ShaderProgram";
export type { ShaderBindings } from "./ShaderProgram";
export { RecordLayout, RecordLayoutBuilder, componentSize, componentGLType } from "./RecordLayout";
export type { ComponentType, FieldLayout, FieldReader, FieldDecl } from "./RecordLayout";
export { TypedBuffer } from "./TypedBuffer";
export type { OwnedBuffer, FieldBindingOptions } from "./TypedBuffer";
export { BufferSet, BufferSetBuilder } from "./BufferSet";
export { drawIndexed, drawArrays } from "./draw";
export type { DrawOptions } from "./draw";
export { FrameScheduler, browserFrameHost } from "./FrameScheduler";
export type { FrameCallback, FrameHost, SchedulerState } from "./FrameScheduler";
export {
  GpuError,
  ShaderCompileError,
  ShaderLinkError,
  UnknownBindingError,
  BufferAllocationError,
  SchedulerInitError,
  LayoutError,
} from "./errors";
export type { ShaderStage, BindingKind } from "./errors";
