import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mat4, vec4 } from "gl-matrix";
import { ShaderProgram } from "./ShaderProgram";
import {
  GpuError,
  ShaderCompileError,
  ShaderLinkError,
  UnknownBindingError,
} from "./errors";
import { FakeGL } from "../test/FakeGL";

const VERT = `#version 300 es
uniform mat4 projection;
uniform vec3 offset;
in vec3 pos;
in vec3 color;
out vec3 vColor;

void main() {
  vColor = color;
  gl_Position = projection * vec4(pos + offset, 1.0);
}
`;

const FRAG = `#version 300 es
precision highp float;
uniform float brightness;
uniform vec4 tint;
in vec3 vColor;
out vec4 outColor;

void main() {
  outColor = vec4(vColor * brightness, 1.0) * tint;
}
`;

const BROKEN = `#version 300 es
#error missing semicolon
`;

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

describe("ShaderProgram", () => {
  let gl: FakeGL;

  beforeEach(() => {
    gl = new FakeGL();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves declared attributes to their slots", () => {
    const shader = new ShaderProgram(gl, VERT, FRAG, { attributes: ["pos", "color"] });
    expect(shader.findAttribute("pos")).toBe(0);
    expect(shader.findAttribute("color")).toBe(1);
  });

  it("returns the same uniform handle on every lookup", () => {
    const uniforms: string[] = ["projection"];
    const attributes: string[] = ["pos"];
    const shader = new ShaderProgram(gl, VERT, FRAG, { uniforms, attributes });

    const first = shader.findUniform("projection");
    for (let i = 0; i < 1000; i++) {
      expect(shader.findUniform("projection")).toBe(first);
    }

    const err = caught(() => shader.findAttribute("missing"));
    expect(err).toBeInstanceOf(UnknownBindingError);
    expect(err).toMatchObject({ binding: "missing", kind: "attribute" });
  });

  it("rejects lookups of uniforms that were not declared up front", () => {
    const shader = new ShaderProgram<string>(gl, VERT, FRAG, { uniforms: ["projection"] });
    expect(() => shader.findUniform("brightness")).toThrow('Unknown uniform "brightness"');
  });

  it("resolves uniforms from either stage", () => {
    const shader = new ShaderProgram(gl, VERT, FRAG, { uniforms: ["projection", "brightness"] });
    expect(shader.findUniform("brightness")).not.toBe(shader.findUniform("projection"));
  });

  it("releases the intermediate shaders after linking", () => {
    new ShaderProgram(gl, VERT, FRAG);
    expect(gl.liveShaders).toBe(0);
    expect(gl.livePrograms).toBe(1);
  });

  it("fails construction on a name the source does not declare, leaving nothing allocated", () => {
    const err = caught(
      () => new ShaderProgram(gl, VERT, FRAG, { uniforms: ["projection", "lightPos"], attributes: ["pos"] })
    );
    expect(err).toBeInstanceOf(UnknownBindingError);
    expect(err).toMatchObject({ binding: "lightPos", kind: "uniform", name: "UnknownBindingError" });
    expect(gl.livePrograms).toBe(0);
    expect(gl.liveShaders).toBe(0);
  });

  it("treats an attribute declared only in the fragment stage as unknown", () => {
    expect(() => new ShaderProgram(gl, VERT, FRAG, { attributes: ["vColor"] })).toThrow(
      'Unknown attribute "vColor"'
    );
  });

  it("surfaces vertex compile diagnostics", () => {
    const err = caught(() => new ShaderProgram(gl, BROKEN, FRAG));
    expect(err).toBeInstanceOf(ShaderCompileError);
    expect(err).toBeInstanceOf(GpuError);
    expect(err).toMatchObject({
      stage: "vertex",
      diagnostic: "ERROR: 0:1: '#error' : compilation terminated",
    });
    expect(gl.liveShaders).toBe(0);
    expect(gl.livePrograms).toBe(0);
  });

  it("releases the compiled vertex stage when the fragment stage fails", () => {
    const err = caught(() => new ShaderProgram(gl, VERT, BROKEN));
    expect(err).toMatchObject({ stage: "fragment" });
    expect(gl.liveShaders).toBe(0);
  });

  it("surfaces link diagnostics and frees everything", () => {
    gl.linkError = "ERROR: varying vColor not written";
    const err = caught(() => new ShaderProgram(gl, VERT, FRAG));
    expect(err).toBeInstanceOf(ShaderLinkError);
    expect(err).toMatchObject({ diagnostic: "ERROR: varying vColor not written" });
    expect(gl.liveShaders).toBe(0);
    expect(gl.livePrograms).toBe(0);
  });

  it("warns about a successful link that still produced a log", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    gl.linkLog = "WARNING: unused varying";
    new ShaderProgram(gl, VERT, FRAG);
    expect(warn).toHaveBeenCalledWith("[retained-gl] Program linked with warnings:\nWARNING: unused varying");
  });

  it("stays quiet when the link log is blank", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    gl.linkLog = "\n";
    new ShaderProgram(gl, VERT, FRAG);
    expect(warn).not.toHaveBeenCalled();
  });

  it("activates idempotently", () => {
    const shader = new ShaderProgram(gl, VERT, FRAG);
    shader.activate();
    shader.activate();
    expect(gl.currentProgram).toBe(shader.handle);
  });

  it("writes uniform values through the cached locations", () => {
    const shader = new ShaderProgram(gl, VERT, FRAG, { uniforms: ["projection", "brightness"] });
    shader.activate();
    shader.setMat4("projection", mat4.create());
    shader.setFloat("brightness", 0.5);

    expect(gl.uniformValues.get(shader.findUniform("projection"))).toEqual([
      1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1,
    ]);
    expect(gl.uniformValues.get(shader.findUniform("brightness"))).toEqual([0.5]);

    shader.setVec3v("brightness", [1, 2, 3]);
    expect(gl.uniformValues.get(shader.findUniform("brightness"))).toEqual([1, 2, 3]);
    shader.setInt("brightness", 7);
    expect(gl.uniformValues.get(shader.findUniform("brightness"))).toEqual([7]);
  });

  it("writes vector uniforms from components and from arrays", () => {
    const shader = new ShaderProgram(gl, VERT, FRAG, { uniforms: ["offset", "tint"] });
    shader.activate();
    shader.setVec3("offset", 1, -2, 0.5);
    shader.setVec4v("tint", vec4.fromValues(0.25, 0.5, 0.75, 1));

    expect(gl.uniformValues.get(shader.findUniform("offset"))).toEqual([1, -2, 0.5]);
    expect(gl.uniformValues.get(shader.findUniform("tint"))).toEqual([0.25, 0.5, 0.75, 1]);

    shader.setVec4v("tint", [1, 0, 0, 1]);
    expect(gl.uniformValues.get(shader.findUniform("tint"))).toEqual([1, 0, 0, 1]);
  });

  it("deletes its program on dispose", () => {
    const shader = new ShaderProgram(gl, VERT, FRAG);
    shader.dispose();
    expect(gl.livePrograms).toBe(0);
  });
});
