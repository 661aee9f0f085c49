import { describe, expect, test, vi } from "vitest";
import { ShaderCompilePipeline } from "../src/core/presets/compilePipeline";
import { createPreset } from "../src/core/presets/types";
import { RecordingBackend } from "./support/recordingBackend";
import { effectSource } from "./support/parameters";

const GAIN = { name: "Gain", kind: "scalar", default: 0.5 };
const FIVE_COLORS = ["A", "B", "C", "D", "E"].map((name) => ({ name, kind: "color" }));

describe("ShaderCompilePipeline", () => {
  test("packs parameters and passes aliases separately from the source", () => {
    const backend = new RecordingBackend();
    const pipeline = new ShaderCompilePipeline(backend);
    const source = effectSource([GAIN]);

    const draft = pipeline.compile(createPreset("Glow", source, "shaders/glow.glsl"), null, null);

    expect(draft.handle).toBe(1);
    expect(draft.preset.status).toBe("valid");
    expect(draft.preset.diagnostic).toBe("");
    expect(draft.preset.sourceText).toBe(source);
    expect(draft.preset.parameters[0]).toMatchObject({ name: "Gain", slotOffset: 0, value: [0.5, 0, 0, 0] });
    expect(backend.compiledUnits).toEqual([
      { sourceName: "shaders/glow.glsl", aliasText: "#define Gain uParams[0].x\n", sourceText: source }
    ]);
  });

  test("keeps the fallback handle and the compiler message on failure", () => {
    const backend = new RecordingBackend();
    const pipeline = new ShaderCompilePipeline(backend);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const draft = pipeline.compile(createPreset("Broken", effectSource([GAIN], "BROKEN")), null, 7);

    expect(draft.handle).toBe(7);
    expect(draft.preset.status).toBe("invalid");
    expect(draft.preset.diagnostic).toBe("Broken:1: syntax error");
    expect(draft.preset.parameters).toHaveLength(1);
    expect(errorSpy).toHaveBeenCalledWith("[pipeline] Compile failed for 'Broken'.");
    errorSpy.mockRestore();
  });

  test("attaches the truncation warning to a valid preset", () => {
    const backend = new RecordingBackend();
    const pipeline = new ShaderCompilePipeline(backend);
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const draft = pipeline.compile(createPreset("Colors", effectSource(FIVE_COLORS)), null, null);

    expect(draft.preset.status).toBe("valid");
    expect(draft.preset.parameters).toHaveLength(4);
    expect(draft.preset.diagnostic).toBe("Parameter budget of 16 floats exceeded at 'E'; dropped 'E'.");
    warnSpy.mockRestore();
  });

  test("appends the truncation warning after a compile error", () => {
    const backend = new RecordingBackend();
    const pipeline = new ShaderCompilePipeline(backend);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    const draft = pipeline.compile(createPreset("Colors", effectSource(FIVE_COLORS, "BROKEN")), null, null);

    expect(draft.preset.diagnostic).toBe(
      "Colors:1: syntax error\nParameter budget of 16 floats exceeded at 'E'; dropped 'E'."
    );
    expect(draft.handle).toBeNull();
    vi.restoreAllMocks();
  });

  test("restores previous values by name before packing", () => {
    const backend = new RecordingBackend();
    const pipeline = new ShaderCompilePipeline(backend);

    const draft = pipeline.compile(createPreset("Glow", effectSource([GAIN])), { Gain: [0.8] }, null);

    expect(draft.preset.parameters[0].value).toEqual([0.8, 0, 0, 0]);
  });
});
