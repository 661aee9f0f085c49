import { ActiveShaderController } from "../core/effects/activeShaderController";
import type { ParameterInput } from "../core/params/parameterValues";
import { PresetStore } from "../core/presets/presetStore";
import { isShaderFilePath, type WritableShaderFileSystem } from "../core/presets/shaderFileSystem";
import { isPresetValid, type Preset, type PresetShortcut } from "../core/presets/types";
import type { RenderBackend } from "../core/render/backend";
import { persistedPresetShortcut, serializePreset, type PersistedPreset } from "./presetConfig";
import { DEFAULT_EFFECT_SETTINGS, normalizeEffectSettings, type EffectSettings } from "./settings";
import { matchPresetShortcut, type ShortcutKeyEvent } from "./shortcuts";

export const UNTITLED_PRESET_NAME = "Untitled";

const MAX_NOTIFICATIONS = 5;

export interface EffectSessionOptions<THandle> {
  backend: RenderBackend<THandle>;
  files: WritableShaderFileSystem;
  settings?: EffectSettings;
}

export interface CompileOutcome {
  ok: boolean;
  diagnostic: string;
}

/**
 * Everything the UI drives: the preset library, the active shader, the local
 * shader files and the effect settings. Listeners fire after every change.
 */
export class EffectSession<THandle> {
  readonly store: PresetStore<THandle>;

  readonly controller: ActiveShaderController<THandle>;

  private readonly files: WritableShaderFileSystem;

  private settings: EffectSettings;

  private notificationLog: string[] = [];

  private readonly listeners = new Set<() => void>();

  private version = 0;

  private lastWatchCheckSeconds: number | null = null;

  private untitledDiagnostic = "";

  constructor(options: EffectSessionOptions<THandle>) {
    this.files = options.files;
    this.settings = options.settings ?? DEFAULT_EFFECT_SETTINGS;
    this.store = new PresetStore({
      compiler: options.backend,
      files: options.files,
      preserveValuesOnFileReload: this.settings.preserveValuesOnFileReload
    });
    this.store.setFileWatching(this.settings.fileWatching);
    this.controller = new ActiveShaderController(this.store, options.backend);
  }

  readonly subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  readonly getVersion = (): number => this.version;

  get notifications(): readonly string[] {
    return this.notificationLog;
  }

  getSettings(): EffectSettings {
    return this.settings;
  }

  getPresets(): Preset[] {
    return this.store.list().map((entry) => entry.preset);
  }

  getActivePreset(): Preset | null {
    return this.controller.getActivePreset();
  }

  /** Diagnostic of the last failed compile with no active preset. */
  getUntitledDiagnostic(): string {
    return this.untitledDiagnostic;
  }

  updateSettings(patch: Partial<EffectSettings>): void {
    this.settings = normalizeEffectSettings(patch, this.settings);
    this.store.setFileWatching(this.settings.fileWatching);
    this.store.setPreserveValuesOnFileReload(this.settings.preserveValuesOnFileReload);
    this.emitChange();
  }

  /**
   * Loads saved file-backed presets with their values and shortcuts, picks up
   * any other shader in the shader directory, then re-activates `activePresetName`.
   */
  restore(persisted: readonly PersistedPreset[], activePresetName: string | null): void {
    let loaded = 0;
    for (const entry of persisted) {
      if (this.store.findIndexByPath(entry.filepath) >= 0) {
        continue;
      }
      const draft = this.store.loadFromFile(entry.filepath, {
        savedValues: entry.paramValues,
        shortcut: persistedPresetShortcut(entry)
      });
      if (draft === null) {
        continue;
      }
      this.store.insert({ preset: { ...draft.preset, name: entry.name }, handle: draft.handle });
      loaded += 1;
    }
    const scanned = this.store.scanDirectory(this.settings.shaderDirectory);
    console.info(`[session] Restored ${loaded} saved preset(s), ${scanned} from the shader directory.`);

    const index = activePresetName === null ? -1 : this.store.findIndexByName(activePresetName);
    this.controller.activate(index >= 0 ? index : null);
    this.emitChange();
  }

  loadShaderFile(path: string): number | null {
    const existing = this.store.findIndexByPath(path);
    if (existing >= 0) {
      this.activate(existing);
      return existing;
    }
    const draft = this.store.loadFromFile(path);
    if (draft === null) {
      this.notify(`Failed to open file: ${path}`);
      return null;
    }
    const index = this.store.insert(draft);
    this.controller.activate(index);
    this.notify(`Loaded shader: ${draft.preset.name}`);
    return index;
  }

  /**
   * Copies a shader from outside the app into the shader directory. A preset
   * already backed by that file reloads on the next file check; otherwise the
   * file is added as a new preset. Returns the library path.
   */
  importShaderFile(fileName: string, sourceText: string): string {
    const baseName = fileName.replace(/^.*[\\/]/, "");
    if (!isShaderFilePath(baseName)) {
      throw new Error(`Not a shader file: ${fileName}`);
    }
    const path = `${this.settings.shaderDirectory}/${baseName}`;
    this.files.writeText(path, sourceText);
    if (this.store.findIndexByPath(path) >= 0) {
      console.info(`[session] Replaced ${path}; waiting for the file check.`);
      this.emitChange();
      return path;
    }
    const draft = this.store.loadFromFile(path);
    if (draft === null) {
      throw new Error(`Failed to read imported file: ${path}`);
    }
    this.store.insert(draft);
    this.notify(`Imported shader: ${draft.preset.name}`);
    return path;
  }

  /**
   * Recompiles the active preset with `sourceText`. With no active preset an
   * Untitled preset is created, but only kept when it compiles.
   */
  compileEditorSource(sourceText: string): CompileOutcome {
    const active = this.controller.activePresetIndex;
    if (active !== null) {
      const ok = this.store.compileAt(active, sourceText);
      this.controller.refresh();
      this.notify(ok ? "Shader compiled successfully" : "Shader compilation failed");
      return { ok, diagnostic: this.store.getPreset(active)?.diagnostic ?? "" };
    }

    const draft = this.store.loadFromSource(UNTITLED_PRESET_NAME, sourceText);
    if (!isPresetValid(draft.preset)) {
      this.store.discardDraft(draft);
      this.untitledDiagnostic = draft.preset.diagnostic;
      this.notify("Shader compilation failed");
      return { ok: false, diagnostic: draft.preset.diagnostic };
    }
    this.untitledDiagnostic = "";
    this.controller.activate(this.store.insert(draft));
    this.notify("Shader compiled successfully");
    return { ok: true, diagnostic: draft.preset.diagnostic };
  }

  /**
   * Writes `sourceText` to the active preset's file, or to `path` when the
   * preset has none. With no active preset the file becomes (or updates) a
   * preset. Saving an active preset onto another preset's path is refused.
   */
  saveEditorSource(sourceText: string, path?: string): CompileOutcome {
    const active = this.controller.activePresetIndex;
    const activePreset = active === null ? null : this.store.getPreset(active);
    const targetPath = activePreset?.sourcePath ?? path;
    if (targetPath === undefined || targetPath.trim().length === 0) {
      throw new Error("No file path to save the shader to.");
    }

    const owner = this.store.findIndexByPath(targetPath);
    if (owner >= 0 && active !== null && owner !== active) {
      const diagnostic = `${targetPath} is already open as '${this.store.getPreset(owner)?.name ?? owner}'.`;
      this.notify(`Failed to save: ${diagnostic}`);
      return { ok: false, diagnostic };
    }

    this.files.writeText(targetPath, sourceText);
    console.info(`[session] Saved ${targetPath}.`);

    if (active === null && owner >= 0) {
      // The file is already a preset: it picks up the saved text.
      this.store.trackFile(targetPath);
      this.controller.activate(owner);
      return this.compileEditorSource(sourceText);
    }
    if (active === null || activePreset === null) {
      const index = this.loadShaderFile(targetPath);
      const preset = index === null ? null : this.store.getPreset(index);
      return { ok: preset !== null && isPresetValid(preset), diagnostic: preset?.diagnostic ?? "" };
    }

    if (activePreset.sourcePath === null) {
      this.store.setSourcePath(active, targetPath);
    } else {
      this.store.trackFile(targetPath);
    }
    if (!this.settings.autoCompileOnSave) {
      this.emitChange();
      return { ok: isPresetValid(activePreset), diagnostic: activePreset.diagnostic };
    }
    return this.compileEditorSource(sourceText);
  }

  activate(index: number | null): void {
    this.controller.activate(index);
    this.notify(`Switched to: ${this.controller.getActivePreset()?.name ?? "Passthrough"}`);
  }

  removePreset(index: number): boolean {
    const removed = this.controller.removePreset(index);
    if (removed) {
      this.emitChange();
    }
    return removed;
  }

  setShortcut(index: number, shortcut: PresetShortcut | null): void {
    this.store.setShortcut(index, shortcut);
    this.emitChange();
  }

  setParameterValue(name: string, input: ParameterInput): void {
    this.controller.setParameterValue(name, input);
    this.emitChange();
  }

  resetParameters(): void {
    this.controller.resetParameters();
    this.emitChange();
  }

  /** Escape selects the passthrough shader; other keys are matched against preset shortcuts. */
  handleKey(event: ShortcutKeyEvent): boolean {
    if (event.key === "Escape") {
      this.activate(null);
      return true;
    }
    const index = matchPresetShortcut(this.getPresets(), event);
    if (index === null) {
      return false;
    }
    this.activate(index);
    return true;
  }

  /** Polls watched files at the configured interval, then renders one frame. */
  tick(timeSeconds: number): void {
    if (this.shouldCheckFiles(timeSeconds)) {
      this.lastWatchCheckSeconds = timeSeconds;
      const reloaded = this.store.checkForChanges();
      if (reloaded.length > 0) {
        if (this.controller.activePresetIndex !== null && reloaded.includes(this.controller.activePresetIndex)) {
          this.controller.refresh();
        }
        for (const index of reloaded) {
          this.notify(`Reloaded shader: ${this.store.getPreset(index)?.name ?? index}`);
        }
      }
    }
    this.controller.renderFrame({ timeSeconds });
  }

  toPersistedPresets(): PersistedPreset[] {
    const persisted: PersistedPreset[] = [];
    for (const preset of this.getPresets()) {
      const entry = serializePreset(preset);
      if (entry !== null) {
        persisted.push(entry);
      }
    }
    return persisted;
  }

  private shouldCheckFiles(timeSeconds: number): boolean {
    if (!this.store.isFileWatching()) {
      return false;
    }
    if (this.lastWatchCheckSeconds === null || timeSeconds < this.lastWatchCheckSeconds) {
      return true;
    }
    return (timeSeconds - this.lastWatchCheckSeconds) * 1000 >= this.settings.fileWatchIntervalMs;
  }

  private notify(message: string): void {
    console.info(`[session] ${message}`);
    this.notificationLog = [...this.notificationLog, message].slice(-MAX_NOTIFICATIONS);
    this.emitChange();
  }

  private emitChange(): void {
    this.version += 1;
    for (const listener of this.listeners) {
      listener();
    }
  }
}
