// main.ts — entry point for the demo page. Builds the instanced cube scene on
// top of the engine and hands it to the frame scheduler.
//
// Every frame the cube's corners are rotated on the host, re-synchronized to
// the GPU and drawn once per instance; the vertex shader offsets each
// instance onto a 40-wide grid receding from the camera.

import { mat4 } from "gl-matrix";
import { BufferSet, FrameScheduler, ShaderProgram, drawIndexed } from "./engine";
import { parseConfig } from "./config";
import { CUBE_INDICES, INDEX_LAYOUT, VERTEX_LAYOUT, makeCube, spinY } from "./cube";

const VERT = `#version 300 es

uniform mat4 projection;
in vec3 pos;
in vec3 color;
out vec3 vColor;

void main() {
  vColor = color;
  vec3 cell = vec3(float(gl_InstanceID % 40) - 20.0, -1.0, -float(gl_InstanceID / 40));
  gl_Position = projection * vec4(pos + cell, 1.0);
}
`;

const FRAG = `#version 300 es
precision highp float;

in vec3 vColor;
out vec4 outColor;

void main() {
  outColor = vec4(vColor, 1.0);
}
`;

function main(): void {
  const config = parseConfig(window.location.search);

  const canvas = document.getElementById("canvas");
  if (!(canvas instanceof HTMLCanvasElement)) throw new Error("No <canvas id=\"canvas\"> on the page");
  const gl = canvas.getContext("webgl2");
  if (!gl) throw new Error("WebGL2 not supported");

  const shader = new ShaderProgram(gl, VERT, FRAG, {
    uniforms: ["projection"],
    attributes: ["pos", "color"],
  });
  shader.activate();

  const cube = BufferSet.builder(gl)
    .add(VERTEX_LAYOUT, makeCube(0.4), "vertex", "dynamic")
    .add(INDEX_LAYOUT, CUBE_INDICES, "index", "static")
    .build();
  const [vertices, indices] = cube.buffers;
  vertices.bindField(shader.findAttribute("pos"), "pos");
  vertices.bindField(shader.findAttribute("color"), "color");

  gl.enable(gl.DEPTH_TEST);
  console.info(`[retained-gl] Drawing ${config.instances} cubes`);

  const projection = mat4.create();
  const scheduler = new FrameScheduler();
  scheduler.start((surfaceChanged) => {
    if (surfaceChanged) {
      canvas.width = window.innerWidth;
      canvas.height = window.innerHeight;
      gl.viewport(0, 0, canvas.width, canvas.height);
      const aspect = canvas.width / Math.max(1, canvas.height);
      mat4.perspective(projection, (config.fov * Math.PI) / 180, aspect, 0.1, 1000);
      shader.setMat4("projection", projection);
    }

    gl.clearColor(0, 0, 0, 1);
    gl.clear(gl.COLOR_BUFFER_BIT | gl.DEPTH_BUFFER_BIT);

    spinY(vertices.records, config.spin);
    vertices.synchronize();

    cube.activate();
    drawIndexed(gl, indices, { instances: config.instances });
  });
}

try {
  main();
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  document.body.innerHTML = `<h1 style="color:red;padding:2rem">${message}</h1>`;
  console.error(err);
}
