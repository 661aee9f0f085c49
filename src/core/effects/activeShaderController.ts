import { resetParameterValues, sanitizeParameterValue, type ParameterInput } from "../params/parameterValues";
import { packUniformRegion } from "../params/uniformPacker";
import type { ParameterDeclaration } from "../params/types";
import type { PresetStore } from "../presets/presetStore";
import type { Preset } from "../presets/types";
import type { RenderBackend } from "../render/backend";

export interface FrameTiming {
  timeSeconds: number;
}

/**
 * Tracks which preset (or the passthrough shader) drives rendering and keeps
 * the backend's shader binding and parameter buffer in step with it.
 */
export class ActiveShaderController<THandle> {
  private readonly store: PresetStore<THandle>;

  private readonly backend: RenderBackend<THandle>;

  private activeIndex: number | null = null;

  private readonly firedTriggers = new Set<string>();

  constructor(store: PresetStore<THandle>, backend: RenderBackend<THandle>) {
    this.store = store;
    this.backend = backend;
    this.backend.bindShader(this.backend.passthrough);
  }

  get activePresetIndex(): number | null {
    return this.activeIndex;
  }

  isPassthrough(): boolean {
    return this.activeIndex === null;
  }

  getActivePreset(): Preset | null {
    return this.activeIndex === null ? null : this.store.getPreset(this.activeIndex);
  }

  /** Selects a preset, or the passthrough shader for `null` or an unknown index. */
  activate(index: number | null): void {
    this.resetFiredTriggers(false);
    if (index === null || this.store.getEntry(index) === null) {
      this.activeIndex = null;
      this.backend.bindShader(this.backend.passthrough);
      console.info("[controller] Passthrough active.");
      return;
    }
    this.activeIndex = index;
    this.backend.bindShader(this.resolveActiveHandle());
    console.info(`[controller] Activated '${this.store.getPreset(index)?.name ?? index}'.`);
  }

  /** Rebinds the active preset's handle, e.g. after it was recompiled. */
  refresh(): void {
    this.backend.bindShader(this.resolveActiveHandle());
  }

  removePreset(index: number): boolean {
    if (this.activeIndex === index) {
      this.activate(null);
    }
    if (!this.store.remove(index)) {
      return false;
    }
    if (this.activeIndex !== null && this.activeIndex > index) {
      this.activeIndex -= 1;
    }
    return true;
  }

  renderFrame(timing: FrameTiming): void {
    const uniforms = this.packActiveRegion();
    this.backend.beginFrame({ uniforms, timeSeconds: timing.timeSeconds });
    this.backend.draw();
    this.backend.composite();
    this.resetFiredTriggers(true);
  }

  /** The single UI mutation entry point: stores a sanitized value and pushes the region. */
  setParameterValue(name: string, input: ParameterInput): void {
    const index = this.requireActiveIndex();
    const preset = this.store.getPreset(index);
    const parameter = preset?.parameters.find((entry) => entry.name === name);
    if (preset === null || parameter === undefined) {
      throw new Error(`Unknown parameter '${name}' on the active preset.`);
    }

    const value = sanitizeParameterValue(parameter, input);
    this.store.setParameters(
      index,
      preset.parameters.map((entry): ParameterDeclaration => (entry.name === name ? { ...entry, value } : entry))
    );
    if (parameter.kind === "trigger") {
      if (value[0] === 1) {
        this.firedTriggers.add(name);
      } else {
        this.firedTriggers.delete(name);
      }
    }
    this.onParameterChanged();
  }

  resetParameters(): void {
    const index = this.requireActiveIndex();
    const preset = this.store.getPreset(index);
    if (preset === null) {
      return;
    }
    this.firedTriggers.clear();
    this.store.setParameters(index, resetParameterValues(preset.parameters));
    this.onParameterChanged();
  }

  onParameterChanged(): void {
    this.backend.setUniformRegion(this.packActiveRegion());
  }

  // A pending pulse wins over a recompile or reload that restarted the trigger at 0.
  private packActiveRegion(): Float32Array {
    const parameters = this.getActivePreset()?.parameters ?? [];
    if (this.firedTriggers.size === 0) {
      return packUniformRegion(parameters);
    }
    return packUniformRegion(
      parameters.map((entry): ParameterDeclaration =>
        entry.kind === "trigger" && this.firedTriggers.has(entry.name)
          ? { ...entry, value: [1, entry.value[1], entry.value[2], entry.value[3]] }
          : entry
      )
    );
  }

  private resolveActiveHandle(): THandle {
    if (this.activeIndex === null) {
      return this.backend.passthrough;
    }
    return this.store.getHandle(this.activeIndex) ?? this.backend.passthrough;
  }

  // Fired triggers stay at 1 for exactly one rendered frame.
  private resetFiredTriggers(push: boolean): void {
    if (this.firedTriggers.size === 0) {
      return;
    }
    const preset = this.getActivePreset();
    if (this.activeIndex !== null && preset !== null) {
      this.store.setParameters(
        this.activeIndex,
        preset.parameters.map((entry): ParameterDeclaration =>
          entry.kind === "trigger" && this.firedTriggers.has(entry.name)
            ? { ...entry, value: [0, entry.value[1], entry.value[2], entry.value[3]] }
            : entry
        )
      );
    }
    this.firedTriggers.clear();
    if (push) {
      this.onParameterChanged();
    }
  }

  private requireActiveIndex(): number {
    if (this.activeIndex === null) {
      throw new Error("No active preset; the passthrough shader has no parameters.");
    }
    return this.activeIndex;
  }
}
