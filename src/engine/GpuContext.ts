// GpuContext — the slice of WebGL2 the engine actually calls.
//
// Everything in the engine programs against this interface rather than the
// full WebGL2RenderingContext, so a real context drops straight in while tests
// can hand over a small in-memory fake. The signatures are narrowed to the
// single overload we use; a WebGL2RenderingContext still satisfies them.

export interface GpuContext {
  // Buffers
  createBuffer(): WebGLBuffer | null;
  deleteBuffer(buffer: WebGLBuffer | null): void;
  bindBuffer(target: GLenum, buffer: WebGLBuffer | null): void;
  bufferData(target: GLenum, srcData: Uint8Array, usage: GLenum): void;

  // Shaders & programs
  createShader(type: GLenum): WebGLShader | null;
  shaderSource(shader: WebGLShader, source: string): void;
  compileShader(shader: WebGLShader): void;
  getShaderParameter(shader: WebGLShader, pname: GLenum): unknown;
  getShaderInfoLog(shader: WebGLShader): string | null;
  deleteShader(shader: WebGLShader | null): void;
  createProgram(): WebGLProgram | null;
  attachShader(program: WebGLProgram, shader: WebGLShader): void;
  linkProgram(program: WebGLProgram): void;
  getProgramParameter(program: WebGLProgram, pname: GLenum): unknown;
  getProgramInfoLog(program: WebGLProgram): string | null;
  deleteProgram(program: WebGLProgram | null): void;
  useProgram(program: WebGLProgram | null): void;
  getAttribLocation(program: WebGLProgram, name: string): GLint;
  getUniformLocation(program: WebGLProgram, name: string): WebGLUniformLocation | null;

  // Uniforms
  uniform1i(location: WebGLUniformLocation | null, x: GLint): void;
  uniform1f(location: WebGLUniformLocation | null, x: GLfloat): void;
  uniform3f(location: WebGLUniformLocation | null, x: GLfloat, y: GLfloat, z: GLfloat): void;
  uniform3fv(location: WebGLUniformLocation | null, data: ArrayLike<number>): void;
  uniform4fv(location: WebGLUniformLocation | null, data: ArrayLike<number>): void;
  uniformMatrix4fv(location: WebGLUniformLocation | null, transpose: GLboolean, data: ArrayLike<number>): void;

  // Vertex attributes & vertex arrays
  vertexAttribPointer(index: GLuint, size: GLint, type: GLenum, normalized: GLboolean, stride: GLsizei, offset: GLintptr): void;
  enableVertexAttribArray(index: GLuint): void;
  vertexAttribDivisor(index: GLuint, divisor: GLuint): void;
  createVertexArray(): WebGLVertexArrayObject | null;
  bindVertexArray(array: WebGLVertexArrayObject | null): void;
  deleteVertexArray(array: WebGLVertexArrayObject | null): void;

  // Draws
  drawArrays(mode: GLenum, first: GLint, count: GLsizei): void;
  drawArraysInstanced(mode: GLenum, first: GLint, count: GLsizei, instanceCount: GLsizei): void;
  drawElements(mode: GLenum, count: GLsizei, type: GLenum, offset: GLintptr): void;
  drawElementsInstanced(mode: GLenum, count: GLsizei, type: GLenum, offset: GLintptr, instanceCount: GLsizei): void;
}

// WebGL2 enum values the engine needs without a live context to read them from.
export const GL = {
  ARRAY_BUFFER: 0x8892,
  ELEMENT_ARRAY_BUFFER: 0x8893,
  STATIC_DRAW: 0x88e4,
  DYNAMIC_DRAW: 0x88e8,

  VERTEX_SHADER: 0x8b31,
  FRAGMENT_SHADER: 0x8b30,
  COMPILE_STATUS: 0x8b81,
  LINK_STATUS: 0x8b82,

  BYTE: 0x1400,
  UNSIGNED_BYTE: 0x1401,
  SHORT: 0x1402,
  UNSIGNED_SHORT: 0x1403,
  INT: 0x1404,
  UNSIGNED_INT: 0x1405,
  FLOAT: 0x1406,

  LINES: 0x0001,
  TRIANGLES: 0x0004,
} as const;

export type BufferKind = "vertex" | "index";
export type BufferUsage = "static" | "dynamic";

export function bufferTarget(kind: BufferKind): GLenum {
  return kind === "vertex" ? GL.ARRAY_BUFFER : GL.ELEMENT_ARRAY_BUFFER;
}

export function bufferUsage(usage: BufferUsage): GLenum {
  return usage === "static" ? GL.STATIC_DRAW : GL.DYNAMIC_DRAW;
}
