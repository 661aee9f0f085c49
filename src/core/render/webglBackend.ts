import { PARAMETER_UNIFORM_NAME } from "../params/uniformPacker";
import { UNIFORM_SLOT_COUNT } from "../params/types";
import type { CompileResult, FrameBeginState, RenderBackend, ShaderSourceUnit } from "./backend";
import {
  createProgram,
  createRenderTarget,
  createVideoTexture,
  deleteRenderTarget,
  requireWebGl2Context,
  ShaderBuildError,
  type RenderTarget
} from "./glUtils";
import { buildCompositeShaderSources, buildEffectShaderSources, buildPassthroughShaderSources } from "./shaderComposer";
import { describeCompileFailure } from "./shaderDiagnostics";

export interface WebGlEffectBackendOptions {
  canvas: HTMLCanvasElement;
  /** Context to draw with; taken from `canvas` when omitted. */
  gl?: WebGL2RenderingContext;
}

export class WebGlEffectBackend implements RenderBackend<WebGLProgram> {
  readonly passthrough: WebGLProgram;

  private readonly canvas: HTMLCanvasElement;

  private readonly gl: WebGL2RenderingContext;

  private readonly compositeProgram: WebGLProgram;

  private readonly vertexArray: WebGLVertexArrayObject;

  private readonly videoTexture: WebGLTexture;

  private boundProgram: WebGLProgram;

  private pendingProgram: WebGLProgram | null = null;

  private readonly deferredReleases = new Set<WebGLProgram>();

  private readonly uniforms = new Float32Array(UNIFORM_SLOT_COUNT);

  private target: RenderTarget | null = null;

  private timeSeconds = 0;

  private videoWidth = 1;

  private videoHeight = 1;

  constructor(options: WebGlEffectBackendOptions) {
    this.canvas = options.canvas;
    this.gl = options.gl ?? requireWebGl2Context(options.canvas);

    const passthroughSources = buildPassthroughShaderSources();
    this.passthrough = createProgram(this.gl, passthroughSources.vertexSource, passthroughSources.fragmentSource);
    const compositeSources = buildCompositeShaderSources();
    this.compositeProgram = createProgram(this.gl, compositeSources.vertexSource, compositeSources.fragmentSource);

    const vertexArray = this.gl.createVertexArray();
    if (vertexArray === null) {
      throw new Error("Failed to create vertex array object.");
    }
    this.vertexArray = vertexArray;
    this.videoTexture = createVideoTexture(this.gl);
    this.boundProgram = this.passthrough;

    console.info("[webgl] Effect backend initialized.");
  }

  compileProgram(unit: ShaderSourceUnit): CompileResult<WebGLProgram> {
    const sources = buildEffectShaderSources(unit);
    try {
      return { ok: true, handle: createProgram(this.gl, sources.vertexSource, sources.fragmentSource) };
    } catch (error) {
      if (!(error instanceof ShaderBuildError)) {
        throw error;
      }
      const lineMap = error.stage === "vertex" ? [] : sources.fragmentLineMap;
      return { ok: false, diagnostic: describeCompileFailure(error.log, lineMap) };
    }
  }

  releaseProgram(handle: WebGLProgram): void {
    if (handle === this.passthrough || handle === this.compositeProgram) {
      return;
    }
    if (handle === this.boundProgram || handle === this.pendingProgram) {
      this.deferredReleases.add(handle);
      return;
    }
    this.gl.deleteProgram(handle);
  }

  bindShader(handle: WebGLProgram): void {
    this.pendingProgram = handle;
  }

  setUniformRegion(region: Float32Array): void {
    this.uniforms.fill(0);
    this.uniforms.set(region.subarray(0, UNIFORM_SLOT_COUNT));
    this.gl.useProgram(this.boundProgram);
    this.uploadParameterUniforms(this.boundProgram);
  }

  beginFrame(state: FrameBeginState): void {
    if (this.pendingProgram !== null) {
      this.boundProgram = this.pendingProgram;
      this.pendingProgram = null;
      this.flushDeferredReleases();
    }
    this.uniforms.fill(0);
    this.uniforms.set(state.uniforms.subarray(0, UNIFORM_SLOT_COUNT));
    this.timeSeconds = state.timeSeconds;

    const gl = this.gl;
    const target = this.ensureTarget();
    gl.bindFramebuffer(gl.FRAMEBUFFER, target.framebuffer);
    gl.viewport(0, 0, target.width, target.height);
    gl.useProgram(this.boundProgram);

    gl.activeTexture(gl.TEXTURE0);
    gl.bindTexture(gl.TEXTURE_2D, this.videoTexture);
    this.setIntUniform(this.boundProgram, "uVideo", 0);
    this.setFloatUniform(this.boundProgram, "uTime", this.timeSeconds);
    this.setVec2Uniform(this.boundProgram, "uResolution", target.width, target.height);
    this.setVec2Uniform(this.boundProgram, "uVideoResolution", this.videoWidth, this.videoHeight);
    this.uploadParameterUniforms(this.boundProgram);
  }

  draw(): void {
    const gl = this.gl;
    gl.bindVertexArray(this.vertexArray);
    gl.drawArrays(gl.TRIANGLES, 0, 3);
  }

  composite(): void {
    if (this.target === null) {
      return;
    }
    const gl = this.gl;
    gl.bindFramebuffer(gl.FRAMEBUFFER, null);
    gl.viewport(0, 0, this.canvas.width, this.canvas.height);
    gl.useProgram(this.compositeProgram);
    gl.activeTexture(gl.TEXTURE0);
    gl.bindTexture(gl.TEXTURE_2D, this.target.texture);
    this.setIntUniform(this.compositeProgram, "uFrame", 0);
    gl.bindVertexArray(this.vertexArray);
    gl.drawArrays(gl.TRIANGLES, 0, 3);
  }

  uploadVideoFrame(source: TexImageSource, width: number, height: number): void {
    const gl = this.gl;
    gl.bindTexture(gl.TEXTURE_2D, this.videoTexture);
    gl.texImage2D(gl.TEXTURE_2D, 0, gl.RGBA, gl.RGBA, gl.UNSIGNED_BYTE, source);
    gl.bindTexture(gl.TEXTURE_2D, null);
    this.videoWidth = Math.max(1, width);
    this.videoHeight = Math.max(1, height);
  }

  setViewportSize(width: number, height: number): void {
    const bufferWidth = Math.max(1, Math.floor(width));
    const bufferHeight = Math.max(1, Math.floor(height));
    if (this.canvas.width === bufferWidth && this.canvas.height === bufferHeight) {
      return;
    }
    this.canvas.width = bufferWidth;
    this.canvas.height = bufferHeight;
    console.info(`[webgl] Canvas buffer resized to ${bufferWidth}x${bufferHeight}.`);
  }

  destroy(): void {
    const gl = this.gl;
    for (const program of this.deferredReleases) {
      gl.deleteProgram(program);
    }
    this.deferredReleases.clear();
    if (this.target !== null) {
      deleteRenderTarget(gl, this.target);
      this.target = null;
    }
    gl.deleteTexture(this.videoTexture);
    gl.deleteVertexArray(this.vertexArray);
    gl.deleteProgram(this.compositeProgram);
    gl.deleteProgram(this.passthrough);
    console.info("[webgl] Destroyed WebGL resources.");
  }

  private ensureTarget(): RenderTarget {
    const width = Math.max(1, this.canvas.width);
    const height = Math.max(1, this.canvas.height);
    if (this.target !== null && this.target.width === width && this.target.height === height) {
      return this.target;
    }
    if (this.target !== null) {
      deleteRenderTarget(this.gl, this.target);
    }
    this.target = createRenderTarget(this.gl, width, height);
    return this.target;
  }

  private flushDeferredReleases(): void {
    for (const program of [...this.deferredReleases]) {
      if (program !== this.boundProgram && program !== this.pendingProgram) {
        this.deferredReleases.delete(program);
        this.gl.deleteProgram(program);
      }
    }
  }

  private uploadParameterUniforms(program: WebGLProgram): void {
    const location = this.gl.getUniformLocation(program, `${PARAMETER_UNIFORM_NAME}[0]`);
    if (location === null) {
      return;
    }
    this.gl.uniform4fv(location, this.uniforms);
  }

  private setFloatUniform(program: WebGLProgram, name: string, value: number): void {
    const location = this.gl.getUniformLocation(program, name);
    if (location === null) {
      return;
    }
    this.gl.uniform1f(location, value);
  }

  private setIntUniform(program: WebGLProgram, name: string, value: number): void {
    const location = this.gl.getUniformLocation(program, name);
    if (location === null) {
      return;
    }
    this.gl.uniform1i(location, value);
  }

  private setVec2Uniform(program: WebGLProgram, name: string, x: number, y: number): void {
    const location = this.gl.getUniformLocation(program, name);
    if (location === null) {
      return;
    }
    this.gl.uniform2f(location, x, y);
  }
}
