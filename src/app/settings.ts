export interface EffectSettings {
  shaderDirectory: string;
  fileWatching: boolean;
  fileWatchIntervalMs: number;
  autoCompileOnSave: boolean;
  autoCompileDelayMs: number;
  /** Hot reload keeps current values by name instead of restoring authored defaults. */
  preserveValuesOnFileReload: boolean;
}

export const DEFAULT_EFFECT_SETTINGS: EffectSettings = {
  shaderDirectory: "shaders",
  fileWatching: true,
  fileWatchIntervalMs: 500,
  autoCompileOnSave: true,
  autoCompileDelayMs: 500,
  preserveValuesOnFileReload: true
};

function clampInteger(value: unknown, min: number, max: number, fallback: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.round(value)));
}

function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function readDirectory(value: unknown, fallback: string): string {
  if (typeof value !== "string") {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : DEFAULT_EFFECT_SETTINGS.shaderDirectory;
}

/**
 * Merges `patch` over `current`, clamping numbers and ignoring fields of the
 * wrong type. Accepts untyped input so persisted settings can go through it.
 */
export function normalizeEffectSettings(
  patch: Partial<Record<keyof EffectSettings, unknown>>,
  current: EffectSettings = DEFAULT_EFFECT_SETTINGS
): EffectSettings {
  return {
    shaderDirectory: readDirectory(patch.shaderDirectory, current.shaderDirectory),
    fileWatching: readBoolean(patch.fileWatching, current.fileWatching),
    fileWatchIntervalMs: clampInteger(patch.fileWatchIntervalMs, 100, 10000, current.fileWatchIntervalMs),
    autoCompileOnSave: readBoolean(patch.autoCompileOnSave, current.autoCompileOnSave),
    autoCompileDelayMs: clampInteger(patch.autoCompileDelayMs, 0, 5000, current.autoCompileDelayMs),
    preserveValuesOnFileReload: readBoolean(patch.preserveValuesOnFileReload, current.preserveValuesOnFileReload)
  };
}
