export interface ShaderSourceUnit {
  /** Label used when mapping compiler diagnostics back to the effect source. */
  sourceName: string;
  /** Generated `#define` aliases, placed directly before `sourceText`. */
  aliasText: string;
  sourceText: string;
}

export type CompileResult<THandle> =
  | { ok: true; handle: THandle }
  | { ok: false; diagnostic: string };

export interface ShaderCompiler<THandle> {
  compileProgram(unit: ShaderSourceUnit): CompileResult<THandle>;
  releaseProgram(handle: THandle): void;
}

export interface FrameBeginState {
  uniforms: Float32Array;
  timeSeconds: number;
}

export interface RenderBackend<THandle> extends ShaderCompiler<THandle> {
  /** Identity program bound when no effect is active. */
  readonly passthrough: THandle;

  /** Records `handle` to be bound by the next `beginFrame`. */
  bindShader(handle: THandle): void;

  /** Replaces the per-frame parameter buffer immediately. */
  setUniformRegion(region: Float32Array): void;

  /** Applies the pending shader, the uniform region and fixed pipeline state together. */
  beginFrame(state: FrameBeginState): void;

  draw(): void;

  composite(): void;
}
