// RecordLayout — declares how one host-side record maps onto GPU bytes.
//
// Fields are listed in order with a component type and count; offsets are
// derived from that declaration (C struct rules: each field aligned to its
// component size, the record padded to its widest component), so a binding
// can never drift from the bytes that encode() writes.
//
//   const VERTEX = RecordLayout.of<Vertex>()
//     .field("pos", "f32", 3, (v) => v.pos)
//     .field("color", "f32", 3, (v) => v.color)
//     .build();
//
//   VERTEX.size                  // 24
//   VERTEX.field("color").offset // 12

import { GL } from "./GpuContext";
import { LayoutError } from "./errors";

export type ComponentType = "i8" | "u8" | "i16" | "u16" | "i32" | "u32" | "f32";

interface ComponentInfo {
  bytes: number;
  glType: GLenum;
  /** Inclusive integer range; absent for floats. */
  range?: readonly [number, number];
  write(view: DataView, offset: number, value: number): void;
}

// DataView wraps integers silently, so encode() checks `range` before writing.
const COMPONENTS: Record<ComponentType, ComponentInfo> = {
  i8: { bytes: 1, glType: GL.BYTE, range: [-0x80, 0x7f], write: (v, o, x) => v.setInt8(o, x) },
  u8: { bytes: 1, glType: GL.UNSIGNED_BYTE, range: [0, 0xff], write: (v, o, x) => v.setUint8(o, x) },
  i16: { bytes: 2, glType: GL.SHORT, range: [-0x8000, 0x7fff], write: (v, o, x) => v.setInt16(o, x, true) },
  u16: { bytes: 2, glType: GL.UNSIGNED_SHORT, range: [0, 0xffff], write: (v, o, x) => v.setUint16(o, x, true) },
  i32: { bytes: 4, glType: GL.INT, range: [-0x80000000, 0x7fffffff], write: (v, o, x) => v.setInt32(o, x, true) },
  u32: { bytes: 4, glType: GL.UNSIGNED_INT, range: [0, 0xffffffff], write: (v, o, x) => v.setUint32(o, x, true) },
  f32: { bytes: 4, glType: GL.FLOAT, write: (v, o, x) => v.setFloat32(o, x, true) },
};

function writeComponent(view: DataView, offset: number, field: FieldLayout, value: number): void {
  const info = COMPONENTS[field.type];
  if (info.range) {
    const [min, max] = info.range;
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new LayoutError(`Field "${field.name}" value ${value} does not fit ${field.type}`);
    }
  }
  info.write(view, offset, value);
}

export function componentSize(type: ComponentType): number {
  return COMPONENTS[type].bytes;
}

export function componentGLType(type: ComponentType): GLenum {
  return COMPONENTS[type].glType;
}

/** Reads one field's components out of a record. */
export type FieldReader<R> = (record: R) => number | ArrayLike<number>;

export interface FieldLayout {
  readonly name: string;
  readonly type: ComponentType;
  readonly count: number;
  readonly offset: number;
  readonly byteLength: number;
  readonly glType: GLenum;
}

export interface FieldDecl<R> {
  name: string;
  type: ComponentType;
  count: number;
  read: FieldReader<R>;
}

function alignUp(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}

export class RecordLayout<R, F extends string = string> {
  /** Bytes per record, including trailing padding. This is the attribute stride. */
  readonly size: number;
  readonly alignment: number;
  private readonly fields: { layout: FieldLayout; read: FieldReader<R> }[];
  private readonly byName = new Map<string, FieldLayout>();

  // Prefer RecordLayout.of<R>(), which types the field names.
  constructor(decls: readonly FieldDecl<R>[], explicitSize?: number) {
    if (decls.length === 0) throw new LayoutError("A record layout needs at least one field");

    let offset = 0;
    let alignment = 1;
    this.fields = decls.map((decl) => {
      if (this.byName.has(decl.name)) throw new LayoutError(`Duplicate field "${decl.name}"`);
      if (!Number.isInteger(decl.count) || decl.count < 1 || decl.count > 4) {
        throw new LayoutError(`Field "${decl.name}" must have 1-4 components, got ${decl.count}`);
      }
      const info = COMPONENTS[decl.type];
      alignment = Math.max(alignment, info.bytes);
      offset = alignUp(offset, info.bytes);
      const layout: FieldLayout = {
        name: decl.name,
        type: decl.type,
        count: decl.count,
        offset,
        byteLength: info.bytes * decl.count,
        glType: info.glType,
      };
      offset += layout.byteLength;
      this.byName.set(decl.name, layout);
      return { layout, read: decl.read };
    });

    const computed = alignUp(offset, alignment);
    if (explicitSize !== undefined) {
      if (explicitSize < computed || explicitSize % alignment !== 0) {
        throw new LayoutError(
          `Declared record size ${explicitSize} does not hold the fields (needs ${computed}, aligned to ${alignment})`
        );
      }
    }
    this.size = explicitSize ?? computed;
    this.alignment = alignment;
  }

  static of<R>(): RecordLayoutBuilder<R, never> {
    return new RecordLayoutBuilder<R, never>([]);
  }

  /** Layout for buffers whose records are bare numbers (index data). */
  static scalar(type: ComponentType): RecordLayout<number, "value"> {
    return RecordLayout.of<number>().field("value", type, 1, (n) => n).build();
  }

  field(name: F): FieldLayout {
    const field = this.byName.get(name);
    if (!field) throw new LayoutError(`Unknown field "${name}"`);
    return field;
  }

  /**
   * GL enum for drawElements, when this layout describes index data: a single
   * unsigned scalar field of 8, 16 or 32 bits. Null otherwise.
   */
  get indexType(): GLenum | null {
    if (this.fields.length !== 1) return null;
    const only = this.fields[0].layout;
    if (only.count !== 1) return null;
    switch (only.type) {
      case "u8":
      case "u16":
      case "u32":
        return only.glType;
      default:
        return null;
    }
  }

  /** Serializes records in declared field order, little-endian; padding stays zero. */
  encode(records: readonly R[]): Uint8Array {
    const bytes = new Uint8Array(records.length * this.size);
    const view = new DataView(bytes.buffer);

    records.forEach((record, i) => {
      const base = i * this.size;
      for (const { layout: field, read } of this.fields) {
        const value = read(record);
        const size = COMPONENTS[field.type].bytes;
        if (typeof value === "number") {
          if (field.count !== 1) {
            throw new LayoutError(`Field "${field.name}" expects ${field.count} components, got 1`);
          }
          writeComponent(view, base + field.offset, field, value);
          continue;
        }
        if (value.length !== field.count) {
          throw new LayoutError(`Field "${field.name}" expects ${field.count} components, got ${value.length}`);
        }
        for (let c = 0; c < field.count; c++) {
          writeComponent(view, base + field.offset + c * size, field, value[c]);
        }
      }
    });

    return bytes;
  }
}

export class RecordLayoutBuilder<R, F extends string> {
  constructor(private readonly decls: readonly FieldDecl<R>[]) {}

  field<K extends string>(
    name: K,
    type: ComponentType,
    count: number,
    read: FieldReader<R>
  ): RecordLayoutBuilder<R, F | K> {
    return new RecordLayoutBuilder<R, F | K>([...this.decls, { name, type, count, read }]);
  }

  /** Freezes the layout. `size` pins the record size and is checked against the fields. */
  build(size?: number): RecordLayout<R, F> {
    return new RecordLayout<R, F>(this.decls, size);
  }
}
