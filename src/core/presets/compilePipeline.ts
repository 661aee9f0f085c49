import { parseParameterDeclarations } from "../params/parameterBlockParser";
import { applyParameterValues } from "../params/parameterValues";
import { packParameters } from "../params/uniformPacker";
import type { ParameterValueMap } from "../params/types";
import type { ShaderCompiler } from "../render/backend";
import type { Preset, PresetDraft } from "./types";

export class ShaderCompilePipeline<THandle> {
  private readonly compiler: ShaderCompiler<THandle>;

  constructor(compiler: ShaderCompiler<THandle>) {
    this.compiler = compiler;
  }

  /**
   * Parses, restores values, packs and compiles `preset.sourceText`. On failure
   * the returned draft keeps `fallbackHandle` so the display does not blank.
   * The stored source is passed through untouched; aliases travel separately.
   */
  compile(
    preset: Preset,
    previousValues: ParameterValueMap | null,
    fallbackHandle: THandle | null
  ): PresetDraft<THandle> {
    const compiling: Preset = { ...preset, status: "compiling" };
    const declarations = applyParameterValues(parseParameterDeclarations(compiling.sourceText), previousValues);
    const packed = packParameters(declarations);
    if (packed.diagnostic !== null) {
      console.warn(`[pipeline] '${preset.name}': ${packed.diagnostic}`);
    }

    const result = this.compiler.compileProgram({
      sourceName: preset.sourcePath ?? preset.name,
      aliasText: packed.aliasText,
      sourceText: compiling.sourceText
    });

    if (result.ok) {
      console.info(`[pipeline] Compiled '${preset.name}' (${packed.parameters.length} parameters).`);
      return {
        preset: {
          ...compiling,
          status: "valid",
          diagnostic: packed.diagnostic ?? "",
          parameters: packed.parameters
        },
        handle: result.handle
      };
    }

    console.error(`[pipeline] Compile failed for '${preset.name}'.`);
    return {
      preset: {
        ...compiling,
        status: "invalid",
        diagnostic: packed.diagnostic === null ? result.diagnostic : `${result.diagnostic}\n${packed.diagnostic}`,
        parameters: packed.parameters
      },
      handle: fallbackHandle
    };
  }
}
