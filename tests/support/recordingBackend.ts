import type { CompileResult, FrameBeginState, RenderBackend, ShaderSourceUnit } from "../../src/core/render/backend";

export interface RecordedFrame {
  handle: number;
  uniforms: number[];
  timeSeconds: number;
}

/**
 * In-process render backend. Handles are integers (0 is passthrough); any
 * source containing `BROKEN` fails to compile.
 */
export class RecordingBackend implements RenderBackend<number> {
  readonly passthrough = 0;

  readonly compiledUnits: ShaderSourceUnit[] = [];

  readonly released: number[] = [];

  readonly calls: string[] = [];

  readonly frames: RecordedFrame[] = [];

  readonly pushedRegions: number[][] = [];

  private nextHandle = 1;

  private pendingHandle: number | null = null;

  boundHandle = 0;

  get compileCount(): number {
    return this.compiledUnits.length;
  }

  compileProgram(unit: ShaderSourceUnit): CompileResult<number> {
    this.compiledUnits.push(unit);
    if (unit.sourceText.includes("BROKEN")) {
      return { ok: false, diagnostic: `${unit.sourceName}:1: syntax error` };
    }
    const handle = this.nextHandle;
    this.nextHandle += 1;
    return { ok: true, handle };
  }

  releaseProgram(handle: number): void {
    this.released.push(handle);
  }

  bindShader(handle: number): void {
    this.calls.push(`bind:${handle}`);
    this.pendingHandle = handle;
  }

  setUniformRegion(region: Float32Array): void {
    this.calls.push("push");
    this.pushedRegions.push(Array.from(region));
  }

  beginFrame(state: FrameBeginState): void {
    if (this.pendingHandle !== null) {
      this.boundHandle = this.pendingHandle;
      this.pendingHandle = null;
    }
    this.calls.push("begin");
    this.frames.push({ handle: this.boundHandle, uniforms: Array.from(state.uniforms), timeSeconds: state.timeSeconds });
  }

  draw(): void {
    this.calls.push("draw");
  }

  composite(): void {
    this.calls.push("composite");
  }
}
