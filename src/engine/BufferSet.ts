// BufferSet — a VAO plus the buffers it owns.
//
// Buffers are declared one builder call at a time and come back as a typed
// tuple, so `set.buffers[0]` is known to be the vertex buffer and
// `set.buffers[1]` the index buffer without any casting:
//
//   const cube = BufferSet.builder(gl)
//     .add(VERTEX, vertices, "vertex", "dynamic")
//     .add(RecordLayout.scalar("u8"), indices, "index", "static")
//     .build();
//   const [vbo, ibo] = cube.buffers;
//
// build() leaves the vertex array bound so field bindings made right after it
// (and the index buffer binding made during it) are captured by the VAO.

import type { BufferKind, BufferUsage, GpuContext } from "./GpuContext";
import type { RecordLayout } from "./RecordLayout";
import type { OwnedBuffer } from "./TypedBuffer";
import { TypedBuffer } from "./TypedBuffer";
import { BufferAllocationError } from "./errors";

// Builds the buffers in declaration order, recording each in `created` so a
// failure partway through can release the ones already allocated.
type BufferFactory<T extends OwnedBuffer[]> = (gl: GpuContext, created: OwnedBuffer[]) => T;

export class BufferSet<T extends readonly OwnedBuffer[]> {
  private constructor(
    private gl: GpuContext,
    readonly vao: WebGLVertexArrayObject,
    readonly buffers: T
  ) {}

  static builder(gl: GpuContext): BufferSetBuilder<[]> {
    return new BufferSetBuilder(gl, (): [] => []);
  }

  /** @internal called by BufferSetBuilder.build */
  static create<T extends OwnedBuffer[]>(gl: GpuContext, make: BufferFactory<T>): BufferSet<T> {
    const vao = gl.createVertexArray();
    if (!vao) throw new BufferAllocationError("vertex array");
    gl.bindVertexArray(vao);

    const created: OwnedBuffer[] = [];
    try {
      return new BufferSet(gl, vao, make(gl, created));
    } catch (err) {
      for (const buffer of created) buffer.dispose();
      gl.bindVertexArray(null);
      gl.deleteVertexArray(vao);
      throw err;
    }
  }

  /** Binds the vertex array. Must happen before any draw that reads these buffers. */
  activate(): void {
    this.gl.bindVertexArray(this.vao);
  }

  synchronize(): void {
    for (const buffer of this.buffers) buffer.synchronize();
  }

  dispose(): void {
    for (const buffer of this.buffers) buffer.dispose();
    this.gl.deleteVertexArray(this.vao);
  }
}

export class BufferSetBuilder<T extends OwnedBuffer[]> {
  constructor(
    private gl: GpuContext,
    private make: BufferFactory<T>
  ) {}

  /** Declares the next buffer; its position in `buffers` is its position here. */
  add<R, F extends string>(
    layout: RecordLayout<R, F>,
    records: R[] = [],
    kind: BufferKind = "vertex",
    usage: BufferUsage = "static"
  ): BufferSetBuilder<[...T, TypedBuffer<R, F>]> {
    const previous = this.make;
    return new BufferSetBuilder(this.gl, (gl, created): [...T, TypedBuffer<R, F>] => {
      const head = previous(gl, created);
      const buffer = new TypedBuffer(gl, layout, records, kind, usage);
      created.push(buffer);
      return [...head, buffer];
    });
  }

  build(): BufferSet<T> {
    return BufferSet.create(this.gl, this.make);
  }
}
