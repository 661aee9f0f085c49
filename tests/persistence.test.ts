import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_EFFECT_SETTINGS } from "../src/app/settings";
import { loadPersistedState, savePersistedState, STORAGE_KEY, type PersistedState } from "../src/utils/persistence";

const STATE: PersistedState = {
  presets: [
    {
      name: "glow",
      filepath: "shaders/glow.glsl",
      shortcutKey: "G",
      shortcutModifiers: 2,
      paramValues: { Gain: [0.75] }
    }
  ],
  settings: { ...DEFAULT_EFFECT_SETTINGS, fileWatchIntervalMs: 1000 },
  shaderFilesByPath: { "shaders/glow.glsl": "void main() {}" },
  activePresetName: "glow"
};

beforeEach(() => {
  localStorage.clear();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("persistence", () => {
  test("returns null when nothing is stored", () => {
    expect(loadPersistedState()).toBeNull();
  });

  test("reads back what was saved", () => {
    savePersistedState(STATE);

    expect(loadPersistedState()).toEqual(STATE);
  });

  test("rejects a payload that is not an object", () => {
    localStorage.setItem(STORAGE_KEY, "[1, 2]");

    expect(() => loadPersistedState()).toThrow("Invalid persisted state payload.");
  });

  test("drops malformed presets and fills in missing fields", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    localStorage.setItem(
      STORAGE_KEY,
      JSON.stringify({
        presets: [{ name: "no file" }, STATE.presets[0]],
        settings: { fileWatching: false, autoCompileDelayMs: -5 },
        shaderFilesByPath: { "shaders/a.glsl": "x", "shaders/b.glsl": 3 }
      })
    );

    expect(loadPersistedState()).toEqual({
      presets: STATE.presets,
      settings: { ...DEFAULT_EFFECT_SETTINGS, fileWatching: false, autoCompileDelayMs: 0 },
      shaderFilesByPath: { "shaders/a.glsl": "x" },
      activePresetName: null
    });
    expect(warn).toHaveBeenCalledWith("[persistence] Dropped malformed preset entry.");
  });
});
