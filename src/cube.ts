// Cube geometry for the demo: 8 shared corners, each with its own color,
// indexed into 12 triangles.

import { vec3 } from "gl-matrix";
import { RecordLayout } from "./engine";

export interface Vertex {
  pos: vec3;
  color: vec3;
}

export const VERTEX_LAYOUT = RecordLayout.of<Vertex>()
  .field("pos", "f32", 3, (v) => v.pos)
  .field("color", "f32", 3, (v) => v.color)
  .build();

export const INDEX_LAYOUT = RecordLayout.scalar("u8");

export function makeCube(halfSize: number): Vertex[] {
  const s = halfSize;
  // Corner colors follow their sign bits: -s → 0, +s → 1.
  // prettier-ignore
  const corners: [number, number, number][] = [
    [-s, -s, -s], [ s, -s, -s], [-s,  s, -s], [-s, -s,  s],
    [ s,  s, -s], [-s,  s,  s], [ s, -s,  s], [ s,  s,  s],
  ];
  return corners.map(([x, y, z]) => ({
    pos: vec3.fromValues(x, y, z),
    color: vec3.fromValues(x > 0 ? 1 : 0, y > 0 ? 1 : 0, z > 0 ? 1 : 0),
  }));
}

// prettier-ignore
export const CUBE_INDICES: number[] = [
  0, 1, 2,  1, 2, 4, // back
  3, 6, 5,  6, 5, 7, // front
  0, 2, 3,  2, 3, 5, // left
  1, 4, 6,  4, 6, 7, // right
  0, 1, 3,  1, 3, 6, // bottom
  2, 4, 5,  4, 5, 7, // top
];

/** Rotates every vertex about the world Y axis, in place. */
export function spinY(vertices: Vertex[], radians: number): void {
  const origin = vec3.create();
  for (const v of vertices) {
    vec3.rotateY(v.pos, v.pos, origin, radians);
  }
}
