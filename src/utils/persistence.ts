import { normalizeEffectSettings, type EffectSettings } from "../app/settings";
import { parsePersistedPreset, type PersistedPreset } from "../app/presetConfig";

export interface PersistedState {
  presets: PersistedPreset[];
  settings: EffectSettings;
  /** Local shader library: path to source text. */
  shaderFilesByPath: Record<string, string>;
  activePresetName: string | null;
}

export const STORAGE_KEY = "live-shader-fx-state-v1";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readShaderFiles(value: unknown): Record<string, string> {
  const files: Record<string, string> = {};
  if (!isRecord(value)) {
    return files;
  }
  for (const [path, source] of Object.entries(value)) {
    if (path.trim().length > 0 && typeof source === "string") {
      files[path] = source;
    }
  }
  return files;
}

export function loadPersistedState(): PersistedState | null {
  const raw = localStorage.getItem(STORAGE_KEY);
  if (raw === null) {
    return null;
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("Invalid persisted state payload.");
  }

  const presets: PersistedPreset[] = [];
  if (Array.isArray(parsed.presets)) {
    for (const entry of parsed.presets) {
      const preset = parsePersistedPreset(entry);
      if (preset === null) {
        console.warn("[persistence] Dropped malformed preset entry.");
        continue;
      }
      presets.push(preset);
    }
  }

  return {
    presets,
    settings: normalizeEffectSettings(isRecord(parsed.settings) ? parsed.settings : {}),
    shaderFilesByPath: readShaderFiles(parsed.shaderFilesByPath),
    activePresetName: typeof parsed.activePresetName === "string" ? parsed.activePresetName : null
  };
}

export function savePersistedState(state: PersistedState): void {
  localStorage.setItem(STORAGE_KEY, JSON.stringify(state));
}
