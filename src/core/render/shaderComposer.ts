import { PARAMETER_UNIFORM_NAME } from "../params/uniformPacker";
import { UNIFORM_VECTOR_COUNT } from "../params/types";
import type { ShaderSourceUnit } from "./backend";

export interface SourceLineRef {
  path: string;
  line: number;
}

/** Line label for generated parameter aliases in diagnostics. */
export const ALIAS_SOURCE_NAME = "parameters";

export interface EffectShaderSources {
  vertexSource: string;
  fragmentSource: string;
  fragmentLineMap: Array<SourceLineRef | null>;
}

export interface DisplayShaderSources {
  vertexSource: string;
  fragmentSource: string;
}

function toLines(source: string): string[] {
  return source.split(/\r\n|\r|\n/);
}

const VERSION_DIRECTIVE = /^\s*#\s*version\b/;

const fullScreenTriangleVertexShader = `#version 300 es
precision highp float;

const vec2 positions[3] = vec2[3](
  vec2(-1.0, -1.0),
  vec2(3.0, -1.0),
  vec2(-1.0, 3.0)
);

out vec2 vUv;

void main() {
  vec2 pos = positions[gl_VertexID];
  vUv = 0.5 * (pos + 1.0);
  gl_Position = vec4(pos, 0.0, 1.0);
}
`;

const effectPrelude = `#version 300 es
precision highp float;

in vec2 vUv;
out vec4 fragColor;

uniform sampler2D uVideo;
uniform float uTime;
uniform vec2 uResolution;
uniform vec2 uVideoResolution;
uniform vec4 ${PARAMETER_UNIFORM_NAME}[${UNIFORM_VECTOR_COUNT}];
`;

const passthroughBody = `
void main() {
  fragColor = texture(uVideo, vUv);
}
`;

const compositeFragmentShader = `#version 300 es
precision highp float;

in vec2 vUv;
out vec4 fragColor;

uniform sampler2D uFrame;

void main() {
  fragColor = vec4(texture(uFrame, vUv).rgb, 1.0);
}
`;

export const EFFECT_SHADER_TEMPLATE = `/*{
  "INPUTS": [
    { "name": "Vignette", "label": "Vignette strength", "kind": "scalar", "min": 0.0, "max": 2.0, "default": 0.5 },
    { "name": "Tint", "kind": "color", "default": [1.0, 1.0, 1.0, 1.0] }
  ]
}*/
// Inputs available to every effect:
//   uVideo            current video frame
//   uTime             playback time in seconds
//   uResolution       output size in pixels
//   uVideoResolution  video size in pixels
//   vUv               texture coordinate of this fragment

void main() {
  vec4 color = texture(uVideo, vUv);
  vec2 center = vUv - 0.5;
  color.rgb *= 1.0 - dot(center, center) * Vignette;
  fragColor = vec4(color.rgb * Tint.rgb, color.a);
}
`;

/**
 * The effect source may carry its own `#version`; the prelude already declares
 * one, so such lines are blanked in place to keep line numbers stable.
 */
function neutralizeVersionDirectives(lines: string[]): string[] {
  return lines.map((line) => (VERSION_DIRECTIVE.test(line) ? `// ${line.trim()}` : line));
}

export function buildEffectShaderSources(unit: ShaderSourceUnit): EffectShaderSources {
  const preludeLines = toLines(effectPrelude.trimEnd());
  const aliasLines = unit.aliasText.length === 0 ? [] : toLines(unit.aliasText.replace(/\n$/, ""));
  const effectLines = neutralizeVersionDirectives(toLines(unit.sourceText));

  const fragmentLineMap: Array<SourceLineRef | null> = [
    ...preludeLines.map(() => null),
    ...aliasLines.map((_line, index) => ({ path: ALIAS_SOURCE_NAME, line: index + 1 })),
    ...effectLines.map((_line, index) => ({ path: unit.sourceName, line: index + 1 }))
  ];

  return {
    vertexSource: fullScreenTriangleVertexShader,
    fragmentSource: [...preludeLines, ...aliasLines, ...effectLines].join("\n"),
    fragmentLineMap
  };
}

export function buildPassthroughShaderSources(): DisplayShaderSources {
  return {
    vertexSource: fullScreenTriangleVertexShader,
    fragmentSource: `${effectPrelude}${passthroughBody}`
  };
}

export function buildCompositeShaderSources(): DisplayShaderSources {
  return {
    vertexSource: fullScreenTriangleVertexShader,
    fragmentSource: compositeFragmentShader
  };
}
