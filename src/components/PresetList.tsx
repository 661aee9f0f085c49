import type { KeyboardEvent as ReactKeyboardEvent } from "react";
import type { Preset, PresetShortcut } from "../core/presets/types";
import { formatShortcut, shortcutFromEvent } from "../app/shortcuts";

interface PresetListProps {
  presets: Preset[];
  activeIndex: number | null;
  onActivate: (index: number | null) => void;
  onRemove: (index: number) => void;
  onShortcutChange: (index: number, shortcut: PresetShortcut | null) => void;
}

const STATUS_LABELS: Record<Preset["status"], string> = {
  unparsed: "not compiled",
  compiling: "compiling",
  valid: "ok",
  invalid: "error"
};

export function PresetList(props: PresetListProps): JSX.Element {
  const captureShortcut = (index: number, event: ReactKeyboardEvent<HTMLInputElement>): void => {
    if (event.key === "Tab") {
      return;
    }
    event.preventDefault();
    if (event.key === "Backspace" || event.key === "Delete") {
      props.onShortcutChange(index, null);
      return;
    }
    const shortcut = shortcutFromEvent(event);
    if (shortcut !== null) {
      props.onShortcutChange(index, shortcut);
    }
  };

  return (
    <ul className="preset-list">
      <li className={props.activeIndex === null ? "preset-item is-active" : "preset-item"}>
        <button type="button" aria-pressed={props.activeIndex === null} onClick={() => props.onActivate(null)}>
          Passthrough
        </button>
        <span className="preset-shortcut">Esc</span>
      </li>
      {props.presets.map((preset, index) => (
        <li
          key={`${index}-${preset.sourcePath ?? preset.name}`}
          className={props.activeIndex === index ? "preset-item is-active" : "preset-item"}
        >
          <button type="button" aria-pressed={props.activeIndex === index} onClick={() => props.onActivate(index)}>
            {preset.name}
          </button>
          <span
            className={`preset-status is-${preset.status}`}
            title={preset.diagnostic.length > 0 ? preset.diagnostic : undefined}
          >
            {STATUS_LABELS[preset.status]}
            {preset.status === "valid" && preset.diagnostic.length > 0 ? " (warning)" : ""}
          </span>
          <input
            className="preset-shortcut-input"
            aria-label={`Shortcut for ${preset.name}`}
            placeholder="none"
            readOnly
            value={formatShortcut(preset.shortcut)}
            onKeyDown={(event) => captureShortcut(index, event)}
          />
          <button type="button" className="preset-remove" aria-label={`Remove ${preset.name}`} onClick={() => props.onRemove(index)}>
            ×
          </button>
        </li>
      ))}
    </ul>
  );
}
