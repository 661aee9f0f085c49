import type { ParameterDeclaration, ParameterValueMap } from "../params/types";

export type PresetStatus = "unparsed" | "compiling" | "valid" | "invalid";

export const SHORTCUT_MODIFIERS = {
  control: 1,
  shift: 2,
  alt: 4
} as const;

export interface PresetShortcut {
  key: string;
  /** Bitmask of `SHORTCUT_MODIFIERS`. */
  modifiers: number;
}

export interface Preset {
  name: string;
  sourcePath: string | null;
  sourceText: string;
  shortcut: PresetShortcut | null;
  status: PresetStatus;
  diagnostic: string;
  parameters: ParameterDeclaration[];
  /** Values read from persisted state, applied on the first compile. */
  savedValues: ParameterValueMap;
}

export interface PresetEntry<THandle> {
  readonly preset: Preset;
  readonly handle: THandle | null;
}

/** A compiled preset that has not been inserted into the store yet. */
export interface PresetDraft<THandle> {
  readonly preset: Preset;
  readonly handle: THandle | null;
}

export function createPreset(name: string, sourceText: string, sourcePath: string | null = null): Preset {
  return {
    name,
    sourcePath,
    sourceText,
    shortcut: null,
    status: "unparsed",
    diagnostic: "",
    parameters: [],
    savedValues: {}
  };
}

export function isPresetValid(preset: Preset): boolean {
  return preset.status === "valid";
}
