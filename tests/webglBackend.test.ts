import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { WebGlEffectBackend } from "../src/core/render/webglBackend";
import { createMockWebGl2Context } from "./support/mockWebGl";

const UNIT = {
  sourceName: "shaders/fx.glsl",
  aliasText: "#define Gain uParams[0].x\n",
  sourceText: "void main() {\n  fragColor = vec4(foo);\n}\n"
};

function createBackend() {
  const mock = createMockWebGl2Context();
  const canvas = document.createElement("canvas");
  canvas.width = 64;
  canvas.height = 32;
  const backend = new WebGlEffectBackend({ canvas, gl: mock.gl });
  return { backend, canvas, mock };
}

function regionOf(first: number): Float32Array {
  const region = new Float32Array(16);
  region[0] = first;
  return region;
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("WebGlEffectBackend", () => {
  test("builds the passthrough and composite programs up front", () => {
    const { backend, mock } = createBackend();

    expect(mock.programs).toHaveLength(2);
    expect(backend.passthrough).toBe(mock.programs[0]);
    expect(mock.fragmentSources[0]).toContain("fragColor = texture(uVideo, vUv);");
  });

  test("compiles the prelude, aliases and effect source as one fragment shader", () => {
    const { backend, mock } = createBackend();

    const result = backend.compileProgram(UNIT);

    expect(result).toEqual({ ok: true, handle: mock.programs[2] });
    const fragment = mock.fragmentSources[2];
    expect(fragment.startsWith("#version 300 es\n")).toBe(true);
    expect(fragment).toContain("uniform vec4 uParams[4];\n#define Gain uParams[0].x\nvoid main() {");
  });

  test("maps compiler errors back to effect source lines", () => {
    const { backend, mock } = createBackend();
    mock.fragmentFailureLog = "ERROR: 0:14: 'foo' : undeclared identifier\nERROR: 1 compilation errors.";

    const result = backend.compileProgram(UNIT);

    expect(result).toEqual({
      ok: false,
      diagnostic: "shaders/fx.glsl:2: 'foo' : undeclared identifier\nERROR: 1 compilation errors."
    });
  });

  test("binds a new program at the next frame begin and uploads the region with it", () => {
    const { backend, mock } = createBackend();
    const result = backend.compileProgram(UNIT);
    if (!result.ok) {
      throw new Error("expected a program");
    }

    backend.bindShader(result.handle);
    expect(mock.usedPrograms).toEqual([]);

    backend.beginFrame({ uniforms: regionOf(0.5), timeSeconds: 2 });

    expect(mock.usedPrograms).toEqual([result.handle]);
    expect(mock.parameterUploads).toEqual([Array.from(regionOf(0.5))]);
  });

  test("uploads a changed region to the bound program immediately", () => {
    const { backend, mock } = createBackend();

    backend.setUniformRegion(regionOf(0.25));

    expect(mock.usedPrograms).toEqual([backend.passthrough]);
    expect(mock.parameterUploads).toEqual([Array.from(regionOf(0.25))]);
  });

  test("defers deleting a bound program until it is replaced", () => {
    const { backend, mock } = createBackend();
    const result = backend.compileProgram(UNIT);
    if (!result.ok) {
      throw new Error("expected a program");
    }
    backend.bindShader(result.handle);
    backend.beginFrame({ uniforms: regionOf(0), timeSeconds: 0 });

    backend.releaseProgram(result.handle);
    expect(mock.deletedPrograms).toEqual([]);

    backend.bindShader(backend.passthrough);
    backend.beginFrame({ uniforms: regionOf(0), timeSeconds: 0 });
    expect(mock.deletedPrograms).toEqual([result.handle]);
  });

  test("deletes unbound programs at once and never the passthrough", () => {
    const { backend, mock } = createBackend();
    const result = backend.compileProgram(UNIT);
    if (!result.ok) {
      throw new Error("expected a program");
    }

    backend.releaseProgram(backend.passthrough);
    backend.releaseProgram(result.handle);

    expect(mock.deletedPrograms).toEqual([result.handle]);
  });

  test("draws the effect offscreen and composites it to the canvas", () => {
    const { backend, mock } = createBackend();

    backend.beginFrame({ uniforms: regionOf(0), timeSeconds: 0 });
    backend.draw();
    backend.composite();

    expect(mock.usedPrograms).toEqual([mock.programs[0], mock.programs[1]]);
  });
});
