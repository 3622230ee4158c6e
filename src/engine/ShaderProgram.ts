// ShaderProgram — compiles vertex + fragment GLSL, links them, and resolves
// every attribute slot and uniform location the caller says it will use.
//
// Lookups happen once, here, instead of lazily per frame: a name the shader
// doesn't declare (or that the linker optimized away) fails construction
// with UnknownBindingError rather than turning into a silent -1 / null
// handle at draw time. Nothing is left allocated when construction throws.

import type { ReadonlyMat4, ReadonlyVec3, ReadonlyVec4 } from "gl-matrix";
import type { GpuContext } from "./GpuContext";
import { GL } from "./GpuContext";
import type { ShaderStage } from "./errors";
import { ShaderCompileError, ShaderLinkError, UnknownBindingError } from "./errors";

export interface ShaderBindings<U extends string, A extends string> {
  uniforms?: readonly U[];
  attributes?: readonly A[];
}

export class ShaderProgram<U extends string = string, A extends string = string> {
  readonly handle: WebGLProgram;
  private readonly attributeSlots = new Map<string, number>();
  private readonly uniformLocations = new Map<string, WebGLUniformLocation>();

  constructor(
    private gl: GpuContext,
    vertexSource: string,
    fragmentSource: string,
    bindings: ShaderBindings<U, A> = {}
  ) {
    const vs = this.compile("vertex", vertexSource);
    let fs: WebGLShader;
    try {
      fs = this.compile("fragment", fragmentSource);
    } catch (err) {
      gl.deleteShader(vs);
      throw err;
    }

    const program = this.link(vs, fs);
    gl.deleteShader(vs);
    gl.deleteShader(fs);

    try {
      for (const name of bindings.attributes ?? []) {
        const slot = gl.getAttribLocation(program, name);
        if (slot < 0) throw new UnknownBindingError(name, "attribute");
        this.attributeSlots.set(name, slot);
      }
      for (const name of bindings.uniforms ?? []) {
        const location = gl.getUniformLocation(program, name);
        if (location === null) throw new UnknownBindingError(name, "uniform");
        this.uniformLocations.set(name, location);
      }
    } catch (err) {
      gl.deleteProgram(program);
      throw err;
    }

    this.handle = program;
  }

  /** Makes this the current program for subsequent draws. */
  activate(): void {
    this.gl.useProgram(this.handle);
  }

  findAttribute(name: A): number {
    const slot = this.attributeSlots.get(name);
    if (slot === undefined) throw new UnknownBindingError(name, "attribute");
    return slot;
  }

  findUniform(name: U): WebGLUniformLocation {
    const location = this.uniformLocations.get(name);
    if (location === undefined) throw new UnknownBindingError(name, "uniform");
    return location;
  }

  // Setters write to the current program; activate() first.

  setMat4(name: U, value: ReadonlyMat4): void {
    this.gl.uniformMatrix4fv(this.findUniform(name), false, value);
  }

  setVec3(name: U, x: number, y: number, z: number): void {
    this.gl.uniform3f(this.findUniform(name), x, y, z);
  }

  setVec3v(name: U, value: ReadonlyVec3 | Float32Array | number[]): void {
    this.gl.uniform3fv(this.findUniform(name), value);
  }

  setVec4v(name: U, value: ReadonlyVec4 | Float32Array | number[]): void {
    this.gl.uniform4fv(this.findUniform(name), value);
  }

  setFloat(name: U, value: number): void {
    this.gl.uniform1f(this.findUniform(name), value);
  }

  setInt(name: U, value: number): void {
    this.gl.uniform1i(this.findUniform(name), value);
  }

  dispose(): void {
    this.gl.deleteProgram(this.handle);
  }

  private compile(stage: ShaderStage, source: string): WebGLShader {
    const gl = this.gl;
    const shader = gl.createShader(stage === "vertex" ? GL.VERTEX_SHADER : GL.FRAGMENT_SHADER);
    if (!shader) throw new ShaderCompileError(stage, "Unable to create shader object");

    gl.shaderSource(shader, source);
    gl.compileShader(shader);

    if (!gl.getShaderParameter(shader, GL.COMPILE_STATUS)) {
      const log = gl.getShaderInfoLog(shader);
      gl.deleteShader(shader);
      throw new ShaderCompileError(stage, log || "Unknown error compiling shader");
    }
    return shader;
  }

  private link(vs: WebGLShader, fs: WebGLShader): WebGLProgram {
    const gl = this.gl;
    const program = gl.createProgram();
    if (!program) {
      gl.deleteShader(vs);
      gl.deleteShader(fs);
      throw new ShaderLinkError("Unable to create program object");
    }

    gl.attachShader(program, vs);
    gl.attachShader(program, fs);
    gl.linkProgram(program);

    const log = gl.getProgramInfoLog(program);
    if (!gl.getProgramParameter(program, GL.LINK_STATUS)) {
      gl.deleteProgram(program);
      gl.deleteShader(vs);
      gl.deleteShader(fs);
      throw new ShaderLinkError(log || "Unknown error linking program");
    }
    if (log && log.trim()) console.warn(`[retained-gl] Program linked with warnings:\n${log}`);
    return program;
  }
}
