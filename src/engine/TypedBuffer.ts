// TypedBuffer — a VBO that remembers what it holds.
//
// `records` is the source of truth on the host. The GPU copy only matches it
// right after synchronize(), which re-encodes and re-uploads the whole thing;
// mutating records does nothing until then.

import type { BufferKind, BufferUsage, GpuContext } from "./GpuContext";
import { bufferTarget, bufferUsage } from "./GpuContext";
import type { ComponentType, RecordLayout } from "./RecordLayout";
import { componentGLType, componentSize } from "./RecordLayout";
import { BufferAllocationError, LayoutError } from "./errors";

export interface FieldBindingOptions {
  normalized?: boolean;
  /** Advance once per N instances instead of once per vertex. Defaults to 0 (per vertex). */
  divisor?: number;
}

/** What a BufferSet needs from any of its buffers, whatever the record type. */
export interface OwnedBuffer {
  readonly handle: WebGLBuffer;
  readonly kind: BufferKind;
  readonly length: number;
  synchronize(): void;
  dispose(): void;
}

export class TypedBuffer<R, F extends string = string> implements OwnedBuffer {
  readonly handle: WebGLBuffer;
  records: R[];

  constructor(
    private gl: GpuContext,
    readonly layout: RecordLayout<R, F>,
    records: R[] = [],
    readonly kind: BufferKind = "vertex",
    readonly usage: BufferUsage = "static"
  ) {
    const handle = gl.createBuffer();
    if (!handle) throw new BufferAllocationError("buffer");
    this.handle = handle;
    this.records = records;
    try {
      this.synchronize();
    } catch (err) {
      gl.deleteBuffer(handle);
      throw err;
    }
  }

  get length(): number {
    return this.records.length;
  }

  get byteLength(): number {
    return this.records.length * this.layout.size;
  }

  /** Replaces the GPU contents with the current records. */
  synchronize(): void {
    const target = bufferTarget(this.kind);
    this.gl.bindBuffer(target, this.handle);
    this.gl.bufferData(target, this.layout.encode(this.records), bufferUsage(this.usage));
  }

  /** Points attribute `slot` at a declared field of every record and enables it. */
  bindField(slot: number, field: F, options: FieldBindingOptions = {}): void {
    const { type, count, offset } = this.layout.field(field);
    this.bindAttribute(slot, count, type, options.normalized ?? false, offset, options.divisor);
  }

  /**
   * Low-level pointer setup; the stride is always the record size. Prefer
   * bindField, which takes count, type and offset from the layout.
   */
  bindAttribute(
    slot: number,
    count: number,
    type: ComponentType,
    normalized: boolean,
    offset: number,
    divisor = 0
  ): void {
    if (this.kind !== "vertex") {
      throw new LayoutError("Index buffers cannot feed vertex attributes");
    }
    if (!Number.isInteger(slot) || slot < 0) {
      throw new LayoutError(`Invalid attribute slot ${slot}`);
    }
    if (!Number.isInteger(count) || count < 1 || count > 4) {
      throw new LayoutError(`Attribute ${slot} must read 1-4 components, got ${count}`);
    }
    const end = offset + count * componentSize(type);
    if (!Number.isInteger(offset) || offset < 0 || end > this.layout.size) {
      throw new LayoutError(
        `Attribute ${slot} reads bytes ${offset}..${end} but records are ${this.layout.size} bytes`
      );
    }
    if (offset % componentSize(type) !== 0) {
      throw new LayoutError(`Attribute ${slot} offset ${offset} is not aligned to ${type}`);
    }
    if (this.layout.size % componentSize(type) !== 0) {
      throw new LayoutError(`Attribute ${slot} stride ${this.layout.size} is not a multiple of ${type}`);
    }

    const gl = this.gl;
    gl.bindBuffer(bufferTarget(this.kind), this.handle);
    gl.vertexAttribPointer(slot, count, componentGLType(type), normalized, this.layout.size, offset);
    gl.enableVertexAttribArray(slot);
    gl.vertexAttribDivisor(slot, divisor);
  }

  dispose(): void {
    this.gl.deleteBuffer(this.handle);
  }
}
