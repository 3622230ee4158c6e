// Draw helpers — count elements from the buffers themselves and refuse to
// issue zero-element draws, which some backends reject.

import type { GpuContext } from "./GpuContext";
import { GL } from "./GpuContext";
import type { TypedBuffer } from "./TypedBuffer";
import { LayoutError } from "./errors";

export interface DrawOptions {
  /** Primitive mode, default TRIANGLES. */
  mode?: GLenum;
  /** Instance count; omit for a non-instanced draw. */
  instances?: number;
}

/**
 * Draws every index in `indices` against the currently active BufferSet.
 * Returns false, without touching the context, when there is nothing to draw.
 */
export function drawIndexed<F extends string>(
  gl: GpuContext,
  indices: TypedBuffer<number, F>,
  { mode = GL.TRIANGLES, instances }: DrawOptions = {}
): boolean {
  const type = indices.layout.indexType;
  if (indices.kind !== "index" || type === null) {
    throw new LayoutError("drawIndexed needs an index buffer of u8, u16 or u32 records");
  }
  if (indices.length === 0 || instances === 0) return false;

  if (instances === undefined) {
    gl.drawElements(mode, indices.length, type, 0);
  } else {
    gl.drawElementsInstanced(mode, indices.length, type, 0, instances);
  }
  return true;
}

/** Non-indexed counterpart: one vertex per record of `vertices`. */
export function drawArrays<R, F extends string>(
  gl: GpuContext,
  vertices: TypedBuffer<R, F>,
  { mode = GL.TRIANGLES, instances }: DrawOptions = {}
): boolean {
  if (vertices.length === 0 || instances === 0) return false;

  if (instances === undefined) {
    gl.drawArrays(mode, 0, vertices.length);
  } else {
    gl.drawArraysInstanced(mode, 0, vertices.length, instances);
  }
  return true;
}
