import { SHORTCUT_MODIFIERS, type Preset, type PresetShortcut } from "../core/presets/types";

/** The subset of `KeyboardEvent` shortcut handling reads. */
export interface ShortcutKeyEvent {
  key: string;
  ctrlKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
  metaKey?: boolean;
}

const MODIFIER_KEYS = new Set(["Control", "Shift", "Alt", "Meta", "AltGraph", "CapsLock"]);

// Meta counts as Control so Cmd+key works on macOS.
export function modifiersFromEvent(event: ShortcutKeyEvent): number {
  let modifiers = 0;
  if (event.ctrlKey || event.metaKey === true) {
    modifiers |= SHORTCUT_MODIFIERS.control;
  }
  if (event.shiftKey) {
    modifiers |= SHORTCUT_MODIFIERS.shift;
  }
  if (event.altKey) {
    modifiers |= SHORTCUT_MODIFIERS.alt;
  }
  return modifiers;
}

function normalizeKey(key: string): string {
  return key.length === 1 ? key.toUpperCase() : key;
}

/** Shortcut described by a key press, or null for a bare modifier or Escape. */
export function shortcutFromEvent(event: ShortcutKeyEvent): PresetShortcut | null {
  if (MODIFIER_KEYS.has(event.key) || event.key === "Escape" || event.key.length === 0) {
    return null;
  }
  return { key: normalizeKey(event.key), modifiers: modifiersFromEvent(event) };
}

/**
 * Index of the first preset whose shortcut key matches and whose required
 * modifiers are all held. Extra held modifiers do not prevent a match.
 */
export function matchPresetShortcut(presets: readonly Preset[], event: ShortcutKeyEvent): number | null {
  const pressed = shortcutFromEvent(event);
  if (pressed === null) {
    return null;
  }
  const index = presets.findIndex(
    (preset) =>
      preset.shortcut !== null &&
      normalizeKey(preset.shortcut.key) === pressed.key &&
      (preset.shortcut.modifiers & pressed.modifiers) === preset.shortcut.modifiers
  );
  return index >= 0 ? index : null;
}

export function formatShortcut(shortcut: PresetShortcut | null): string {
  if (shortcut === null) {
    return "";
  }
  const parts: string[] = [];
  if ((shortcut.modifiers & SHORTCUT_MODIFIERS.control) !== 0) {
    parts.push("Ctrl");
  }
  if ((shortcut.modifiers & SHORTCUT_MODIFIERS.shift) !== 0) {
    parts.push("Shift");
  }
  if ((shortcut.modifiers & SHORTCUT_MODIFIERS.alt) !== 0) {
    parts.push("Alt");
  }
  parts.push(normalizeKey(shortcut.key));
  return parts.join("+");
}
