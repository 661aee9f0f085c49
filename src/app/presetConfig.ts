import { snapshotParameterValues } from "../core/params/parameterValues";
import type { ParameterValueMap } from "../core/params/types";
import { SHORTCUT_MODIFIERS, type Preset, type PresetShortcut } from "../core/presets/types";

/** One saved preset. Only file-backed presets are written. */
export interface PersistedPreset {
  name: string;
  filepath: string;
  /** Empty when the preset has no shortcut. */
  shortcutKey: string;
  shortcutModifiers: number;
  /** Arrays of 1, 2 or 4 numbers depending on the parameter kind. */
  paramValues: ParameterValueMap;
}

const MODIFIER_MASK = SHORTCUT_MODIFIERS.control | SHORTCUT_MODIFIERS.shift | SHORTCUT_MODIFIERS.alt;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function serializePreset(preset: Preset): PersistedPreset | null {
  if (preset.sourcePath === null) {
    return null;
  }
  return {
    name: preset.name,
    filepath: preset.sourcePath,
    shortcutKey: preset.shortcut?.key ?? "",
    shortcutModifiers: preset.shortcut?.modifiers ?? 0,
    paramValues: snapshotParameterValues(preset.parameters)
  };
}

function parseParamValues(value: unknown): ParameterValueMap {
  const values: ParameterValueMap = {};
  if (!isRecord(value)) {
    return values;
  }
  for (const [name, entry] of Object.entries(value)) {
    if (!Array.isArray(entry)) {
      continue;
    }
    const numbers = entry.filter((component): component is number => typeof component === "number");
    if (numbers.length === entry.length && numbers.length > 0 && numbers.length <= 4) {
      values[name] = numbers;
    }
  }
  return values;
}

/** Validates one stored preset entry; malformed entries become null. */
export function parsePersistedPreset(value: unknown): PersistedPreset | null {
  if (!isRecord(value)) {
    return null;
  }
  const { name, filepath, shortcutKey, shortcutModifiers } = value;
  if (typeof filepath !== "string" || filepath.trim().length === 0) {
    return null;
  }
  return {
    name: typeof name === "string" && name.length > 0 ? name : filepath,
    filepath,
    shortcutKey: typeof shortcutKey === "string" ? shortcutKey : "",
    shortcutModifiers:
      typeof shortcutModifiers === "number" && Number.isInteger(shortcutModifiers)
        ? shortcutModifiers & MODIFIER_MASK
        : 0,
    paramValues: parseParamValues(value.paramValues)
  };
}

export function persistedPresetShortcut(entry: PersistedPreset): PresetShortcut | null {
  if (entry.shortcutKey.length === 0) {
    return null;
  }
  return { key: entry.shortcutKey, modifiers: entry.shortcutModifiers };
}
