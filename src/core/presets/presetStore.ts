import { snapshotParameterValues } from "../params/parameterValues";
import type { ParameterDeclaration, ParameterValueMap } from "../params/types";
import type { ShaderCompiler } from "../render/backend";
import { ShaderCompilePipeline } from "./compilePipeline";
import { baseNameWithoutExtension, isShaderFilePath, type ShaderFileSystem } from "./shaderFileSystem";
import {
  createPreset,
  isPresetValid,
  type Preset,
  type PresetDraft,
  type PresetEntry,
  type PresetShortcut
} from "./types";

export interface PresetStoreOptions<THandle> {
  compiler: ShaderCompiler<THandle>;
  files: ShaderFileSystem;
  preserveValuesOnFileReload?: boolean;
}

export interface LoadFromFileOptions {
  savedValues?: ParameterValueMap;
  shortcut?: PresetShortcut | null;
}

/**
 * Ordered preset library. Each preset is stored together with its compiled
 * handle in a single entry, so presets and handles can never drift apart.
 */
export class PresetStore<THandle> {
  private readonly entries: Array<PresetEntry<THandle>> = [];

  private readonly compiler: ShaderCompiler<THandle>;

  private readonly pipeline: ShaderCompilePipeline<THandle>;

  private readonly files: ShaderFileSystem;

  private readonly fileTimestamps = new Map<string, number>();

  private fileWatching = false;

  private preserveValuesOnFileReload: boolean;

  constructor(options: PresetStoreOptions<THandle>) {
    this.compiler = options.compiler;
    this.pipeline = new ShaderCompilePipeline(options.compiler);
    this.files = options.files;
    this.preserveValuesOnFileReload = options.preserveValuesOnFileReload ?? true;
  }

  get count(): number {
    return this.entries.length;
  }

  list(): Array<PresetEntry<THandle>> {
    return [...this.entries];
  }

  getEntry(index: number): PresetEntry<THandle> | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return null;
    }
    return this.entries[index];
  }

  getPreset(index: number): Preset | null {
    return this.getEntry(index)?.preset ?? null;
  }

  getHandle(index: number): THandle | null {
    return this.getEntry(index)?.handle ?? null;
  }

  findIndexByPath(path: string): number {
    return this.entries.findIndex((entry) => entry.preset.sourcePath === path);
  }

  findIndexByName(name: string): number {
    return this.entries.findIndex((entry) => entry.preset.name === name);
  }

  /** Reads and compiles a shader file. Returns null when the file cannot be read. */
  loadFromFile(path: string, options: LoadFromFileOptions = {}): PresetDraft<THandle> | null {
    const sourceText = this.files.readText(path);
    if (sourceText === null) {
      console.warn(`[store] Failed to open file: ${path}`);
      return null;
    }
    const base: Preset = {
      ...createPreset(baseNameWithoutExtension(path), sourceText, path),
      shortcut: options.shortcut ?? null,
      savedValues: options.savedValues ?? {}
    };
    return this.pipeline.compile(base, base.savedValues, null);
  }

  loadFromSource(name: string, sourceText: string): PresetDraft<THandle> {
    return this.pipeline.compile(createPreset(name, sourceText), null, null);
  }

  /** Recompiles a draft that has not been inserted yet, keeping its values by name. */
  compileDraft(draft: PresetDraft<THandle>, sourceText?: string): PresetDraft<THandle> {
    const base: Preset = { ...draft.preset, sourceText: sourceText ?? draft.preset.sourceText };
    const next = this.pipeline.compile(base, snapshotParameterValues(draft.preset.parameters), draft.handle);
    this.releaseReplaced(draft.handle, next.handle);
    return next;
  }

  discardDraft(draft: PresetDraft<THandle>): void {
    if (draft.handle !== null) {
      this.compiler.releaseProgram(draft.handle);
    }
  }

  /** Stores an already compiled draft. Returns its index. */
  insert(draft: PresetDraft<THandle>): number {
    this.entries.push({ preset: draft.preset, handle: draft.handle });
    this.trackFile(draft.preset.sourcePath);
    console.info(`[store] Added '${draft.preset.name}' at ${this.entries.length - 1}.`);
    return this.entries.length - 1;
  }

  remove(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      return false;
    }
    const [removed] = this.entries.splice(index, 1);
    if (removed.preset.sourcePath !== null) {
      this.fileTimestamps.delete(removed.preset.sourcePath);
    }
    if (removed.handle !== null) {
      this.compiler.releaseProgram(removed.handle);
    }
    console.info(`[store] Removed '${removed.preset.name}'.`);
    return true;
  }

  /**
   * Recompiles the preset at `index`, optionally with new source. Current
   * values carry over to parameters that keep their name.
   */
  compileAt(index: number, sourceText?: string): boolean {
    const entry = this.getEntry(index);
    if (entry === null) {
      return false;
    }
    const base: Preset = { ...entry.preset, sourceText: sourceText ?? entry.preset.sourceText };
    const next = this.pipeline.compile(base, snapshotParameterValues(entry.preset.parameters), entry.handle);
    this.replaceEntry(index, next);
    return isPresetValid(next.preset);
  }

  setShortcut(index: number, shortcut: PresetShortcut | null): void {
    const entry = this.requireEntry(index);
    this.entries[index] = { preset: { ...entry.preset, shortcut }, handle: entry.handle };
  }

  setParameters(index: number, parameters: ParameterDeclaration[]): void {
    const entry = this.requireEntry(index);
    this.entries[index] = { preset: { ...entry.preset, parameters }, handle: entry.handle };
  }

  setSourcePath(index: number, sourcePath: string): void {
    const entry = this.requireEntry(index);
    if (entry.preset.sourcePath !== null) {
      this.fileTimestamps.delete(entry.preset.sourcePath);
    }
    this.entries[index] = {
      preset: { ...entry.preset, sourcePath, name: baseNameWithoutExtension(sourcePath) },
      handle: entry.handle
    };
    this.trackFile(sourcePath);
  }

  setFileWatching(enabled: boolean): void {
    this.fileWatching = enabled;
  }

  isFileWatching(): boolean {
    return this.fileWatching;
  }

  setPreserveValuesOnFileReload(enabled: boolean): void {
    this.preserveValuesOnFileReload = enabled;
  }

  /** Marks a file's current modification time as seen, e.g. after the app wrote it. */
  trackFile(path: string | null): void {
    if (path === null) {
      return;
    }
    const modified = this.files.modifiedTime(path);
    if (modified !== null) {
      this.fileTimestamps.set(path, modified);
    }
  }

  /** Reloads file-backed presets whose file changed since it was last seen. */
  checkForChanges(): number[] {
    if (!this.fileWatching) {
      return [];
    }

    const reloaded: number[] = [];
    for (let index = 0; index < this.entries.length; index += 1) {
      const path = this.entries[index].preset.sourcePath;
      if (path === null) {
        continue;
      }
      const modified = this.files.modifiedTime(path);
      const known = this.fileTimestamps.get(path);
      if (modified === null || known === undefined || modified === known) {
        continue;
      }
      if (this.reloadFromFile(index)) {
        reloaded.push(index);
      }
      this.fileTimestamps.set(path, modified);
    }
    return reloaded;
  }

  /** Loads every shader file in `directory` that is not in the store yet. */
  scanDirectory(directory: string): number {
    let added = 0;
    for (const path of this.files.listFiles(directory)) {
      if (!isShaderFilePath(path) || this.findIndexByPath(path) >= 0) {
        continue;
      }
      const draft = this.loadFromFile(path);
      if (draft !== null) {
        this.insert(draft);
        added += 1;
      }
    }
    console.info(`[store] Scanned '${directory}': ${added} preset(s) added.`);
    return added;
  }

  private reloadFromFile(index: number): boolean {
    const entry = this.entries[index];
    const path = entry.preset.sourcePath;
    if (path === null) {
      return false;
    }
    const sourceText = this.files.readText(path);
    if (sourceText === null) {
      return false;
    }

    // Wholesale replacement; only the name, the shortcut (and, when enabled, values) survive.
    const base: Preset = { ...createPreset(entry.preset.name, sourceText, path), shortcut: entry.preset.shortcut };
    const previousValues = this.preserveValuesOnFileReload ? snapshotParameterValues(entry.preset.parameters) : null;
    this.replaceEntry(index, this.pipeline.compile(base, previousValues, entry.handle));
    console.info(`[store] Reloaded '${base.name}' from ${path}.`);
    return true;
  }

  private replaceEntry(index: number, draft: PresetDraft<THandle>): void {
    const previous = this.requireEntry(index);
    this.entries[index] = { preset: draft.preset, handle: draft.handle };
    this.releaseReplaced(previous.handle, draft.handle);
  }

  private releaseReplaced(previous: THandle | null, next: THandle | null): void {
    if (previous !== null && previous !== next) {
      this.compiler.releaseProgram(previous);
    }
  }

  private requireEntry(index: number): PresetEntry<THandle> {
    const entry = this.getEntry(index);
    if (entry === null) {
      throw new Error(`Preset index out of range: ${index}`);
    }
    return entry;
  }
}
