import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { PresetStore } from "../src/core/presets/presetStore";
import { MemoryShaderFileSystem } from "../src/core/presets/shaderFileSystem";
import type { ParameterDeclaration } from "../src/core/params/types";
import { RecordingBackend } from "./support/recordingBackend";
import { effectSource } from "./support/parameters";

const GAIN = { name: "Gain", kind: "scalar", default: 0.5 };
const GLOW_SOURCE = effectSource([GAIN]);

function createStore(files = new MemoryShaderFileSystem(), preserveValuesOnFileReload?: boolean) {
  const backend = new RecordingBackend();
  const store = new PresetStore({ compiler: backend, files, preserveValuesOnFileReload });
  return { backend, files, store };
}

function setGain(store: PresetStore<number>, index: number, gain: number): void {
  const preset = store.getPreset(index);
  if (preset === null) {
    throw new Error("missing preset");
  }
  store.setParameters(
    index,
    preset.parameters.map((entry): ParameterDeclaration => (entry.name === "Gain" ? { ...entry, value: [gain, 0, 0, 0] } : entry))
  );
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("PresetStore loading", () => {
  test("returns null for a file that cannot be read", () => {
    const { store } = createStore();

    expect(store.loadFromFile("shaders/missing.glsl")).toBeNull();
    expect(store.count).toBe(0);
  });

  test("compiles a file once and inserts the compiled pair", () => {
    const { backend, store } = createStore(new MemoryShaderFileSystem({ "shaders/glow.glsl": GLOW_SOURCE }));

    const draft = store.loadFromFile("shaders/glow.glsl");
    if (draft === null) {
      throw new Error("expected a draft");
    }
    const index = store.insert(draft);

    expect(index).toBe(0);
    expect(backend.compileCount).toBe(1);
    expect(store.getPreset(0)).toMatchObject({ name: "glow", sourcePath: "shaders/glow.glsl", status: "valid" });
    expect(store.getHandle(0)).toBe(1);
  });

  test("applies saved values and shortcut when loading a file", () => {
    const { store } = createStore(new MemoryShaderFileSystem({ "shaders/glow.glsl": GLOW_SOURCE }));

    const draft = store.loadFromFile("shaders/glow.glsl", {
      savedValues: { Gain: [0.9] },
      shortcut: { key: "G", modifiers: 1 }
    });

    expect(draft?.preset.parameters[0].value).toEqual([0.9, 0, 0, 0]);
    expect(draft?.preset.shortcut).toEqual({ key: "G", modifiers: 1 });
  });

  test("recompiles a draft with its values and releases the replaced handle", () => {
    const { backend, store } = createStore();
    const draft = store.loadFromSource("Untitled", GLOW_SOURCE);
    const tuned = {
      preset: {
        ...draft.preset,
        parameters: draft.preset.parameters.map((entry): ParameterDeclaration => ({ ...entry, value: [0.9, 0, 0, 0] }))
      },
      handle: draft.handle
    };

    const next = store.compileDraft(tuned, `// edited\n${GLOW_SOURCE}`);

    expect(next.handle).toBe(2);
    expect(next.preset.parameters[0].value).toEqual([0.9, 0, 0, 0]);
    expect(backend.released).toEqual([1]);
    expect(store.count).toBe(0);
  });
});

describe("PresetStore recompile", () => {
  test("preserves current values when only a comment changes", () => {
    const { backend, store } = createStore();
    store.insert(store.loadFromSource("Glow", GLOW_SOURCE));
    setGain(store, 0, 0.8);

    expect(store.compileAt(0, `// tweak\n${GLOW_SOURCE}`)).toBe(true);

    expect(store.getPreset(0)?.parameters[0].value).toEqual([0.8, 0, 0, 0]);
    expect(store.getHandle(0)).toBe(2);
    expect(backend.released).toEqual([1]);
  });

  test("keeps the previous handle when the new source fails", () => {
    const { backend, store } = createStore();
    store.insert(store.loadFromSource("Glow", GLOW_SOURCE));

    expect(store.compileAt(0, `${GLOW_SOURCE}BROKEN`)).toBe(false);

    expect(store.getHandle(0)).toBe(1);
    expect(store.getPreset(0)).toMatchObject({ status: "invalid", diagnostic: "Glow:1: syntax error" });
    expect(backend.released).toEqual([]);
  });

  test("keeps presets and handles paired across inserts, removals and recompiles", () => {
    const { store } = createStore();
    store.insert(store.loadFromSource("A", GLOW_SOURCE));
    store.insert(store.loadFromSource("B", GLOW_SOURCE));
    store.insert(store.loadFromSource("C", GLOW_SOURCE));
    store.insert(store.loadFromSource("D", "BROKEN"));
    expect(store.remove(1)).toBe(true);
    expect(store.remove(-1)).toBe(false);
    expect(store.remove(10)).toBe(false);
    store.compileAt(1, `// again\n${GLOW_SOURCE}`);

    expect(store.list().map((entry) => [entry.preset.name, entry.handle])).toEqual([
      ["A", 1],
      ["C", 4],
      ["D", null]
    ]);
    expect(store.count).toBe(3);
  });

  test("releases the handle of a removed preset", () => {
    const { backend, store } = createStore();
    store.insert(store.loadFromSource("A", GLOW_SOURCE));

    store.remove(0);

    expect(backend.released).toEqual([1]);
    expect(store.getEntry(0)).toBeNull();
  });

  test("throws for mutations at an unknown index", () => {
    const { store } = createStore();

    expect(() => store.setShortcut(5, null)).toThrow("Preset index out of range: 5");
  });
});

describe("PresetStore file watching", () => {
  function watchedGlow(preserve?: boolean) {
    const context = createStore(new MemoryShaderFileSystem({ "shaders/glow.glsl": GLOW_SOURCE }), preserve);
    const draft = context.store.loadFromFile("shaders/glow.glsl");
    if (draft === null) {
      throw new Error("expected a draft");
    }
    context.store.insert(draft);
    context.store.setShortcut(0, { key: "G", modifiers: 0 });
    setGain(context.store, 0, 0.9);
    context.store.setFileWatching(true);
    return context;
  }

  test("reloads changed files and keeps values and shortcut", () => {
    const { files, store } = watchedGlow();
    expect(store.checkForChanges()).toEqual([]);

    files.writeText("shaders/glow.glsl", `// saved elsewhere\n${GLOW_SOURCE}`);

    expect(store.checkForChanges()).toEqual([0]);
    expect(store.getPreset(0)?.sourceText).toBe(`// saved elsewhere\n${GLOW_SOURCE}`);
    expect(store.getPreset(0)?.shortcut).toEqual({ key: "G", modifiers: 0 });
    expect(store.getPreset(0)?.parameters[0].value).toEqual([0.9, 0, 0, 0]);
    expect(store.checkForChanges()).toEqual([]);
  });

  test("keeps a renamed preset's name across a reload", () => {
    const { files, store } = watchedGlow();
    const preset = store.getPreset(0);
    const handle = store.getHandle(0);
    if (preset === null) {
      throw new Error("missing preset");
    }
    store.remove(0);
    store.insert({ preset: { ...preset, name: "Soft glow" }, handle });

    files.writeText("shaders/glow.glsl", `// saved elsewhere\n${GLOW_SOURCE}`);
    store.checkForChanges();

    expect(store.getPreset(0)?.name).toBe("Soft glow");
  });

  test("restores authored defaults on reload when value preservation is off", () => {
    const { files, store } = watchedGlow(false);

    files.writeText("shaders/glow.glsl", `// saved elsewhere\n${GLOW_SOURCE}`);
    store.checkForChanges();

    expect(store.getPreset(0)?.parameters[0].value).toEqual([0.5, 0, 0, 0]);
    expect(store.getPreset(0)?.shortcut).toEqual({ key: "G", modifiers: 0 });
  });

  test("keeps the running program when the reloaded file fails", () => {
    const { files, store } = watchedGlow();

    files.writeText("shaders/glow.glsl", "BROKEN");

    expect(store.checkForChanges()).toEqual([0]);
    expect(store.getHandle(0)).toBe(1);
    expect(store.getPreset(0)?.status).toBe("invalid");
  });

  test("does nothing while watching is off", () => {
    const { files, store } = watchedGlow();
    store.setFileWatching(false);

    files.writeText("shaders/glow.glsl", `// changed\n${GLOW_SOURCE}`);

    expect(store.checkForChanges()).toEqual([]);
    expect(store.getPreset(0)?.sourceText).toBe(GLOW_SOURCE);
  });
});

describe("PresetStore.scanDirectory", () => {
  test("adds unloaded shader files from the directory only", () => {
    const files = new MemoryShaderFileSystem({
      "shaders/a.glsl": GLOW_SOURCE,
      "shaders/b.FRAG": GLOW_SOURCE,
      "shaders/c.fs": "BROKEN",
      "shaders/readme.txt": "notes",
      "shaders/nested/d.glsl": GLOW_SOURCE,
      "other/e.glsl": GLOW_SOURCE
    });
    const { store } = createStore(files);
    const draft = store.loadFromFile("shaders/a.glsl");
    if (draft === null) {
      throw new Error("expected a draft");
    }
    store.insert(draft);

    expect(store.scanDirectory("shaders")).toBe(2);

    expect(store.list().map((entry) => [entry.preset.name, entry.preset.status])).toEqual([
      ["a", "valid"],
      ["b", "valid"],
      ["c", "invalid"]
    ]);
  });
});
