export type ParameterKind = "scalar" | "toggle" | "enum" | "color" | "point2d" | "trigger";

export type ParameterVector = [number, number, number, number];

export interface ParameterDeclaration {
  name: string;
  label: string;
  kind: ParameterKind;
  value: ParameterVector;
  defaultValue: ParameterVector;
  min: number;
  max: number;
  step: number;
  enumLabels: string[];
  /** Float index into the uniform region, or -1 while unpacked. */
  slotOffset: number;
}

/** Current values keyed by parameter name, each trimmed to the kind's slot width. */
export type ParameterValueMap = Record<string, number[]>;

export const UNIFORM_SLOT_COUNT = 16;

export const UNIFORM_VECTOR_COUNT = UNIFORM_SLOT_COUNT / 4;

export const UNPACKED_SLOT = -1;
