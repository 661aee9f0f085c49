import { UNIFORM_SLOT_COUNT, type ParameterDeclaration, type ParameterKind } from "./types";

/** Name of the `vec4[4]` uniform the aliases index into. */
export const PARAMETER_UNIFORM_NAME = "uParams";

const COMPONENTS = ["x", "y", "z", "w"] as const;

export interface PackResult {
  parameters: ParameterDeclaration[];
  aliasText: string;
  droppedNames: string[];
  /** Truncation warning, or null when every declaration fit. */
  diagnostic: string | null;
}

export function slotWidth(kind: ParameterKind): 1 | 2 | 4 {
  switch (kind) {
    case "point2d":
      return 2;
    case "color":
      return 4;
    default:
      return 1;
  }
}

function alignCursor(cursor: number, kind: ParameterKind): number {
  const alignment = slotWidth(kind);
  const remainder = cursor % alignment;
  return remainder === 0 ? cursor : cursor + (alignment - remainder);
}

function clonePacked(declaration: ParameterDeclaration, slotOffset: number): ParameterDeclaration {
  return {
    ...declaration,
    value: [...declaration.value],
    defaultValue: [...declaration.defaultValue],
    enumLabels: [...declaration.enumLabels],
    slotOffset
  };
}

function componentExpression(slotOffset: number): string {
  return `${PARAMETER_UNIFORM_NAME}[${Math.floor(slotOffset / 4)}].${COMPONENTS[slotOffset % 4]}`;
}

export function buildParameterAlias(parameter: ParameterDeclaration): string {
  const offset = parameter.slotOffset;
  switch (parameter.kind) {
    case "scalar":
    case "trigger":
      return componentExpression(offset);
    case "toggle":
      return `(${componentExpression(offset)} > 0.5)`;
    case "enum":
      return `int(${componentExpression(offset)})`;
    case "point2d":
      return `vec2(${componentExpression(offset)}, ${componentExpression(offset + 1)})`;
    case "color":
      // 4-aligned, so the whole vector belongs to this parameter
      return `${PARAMETER_UNIFORM_NAME}[${Math.floor(offset / 4)}]`;
  }
}

export function buildAliasText(parameters: readonly ParameterDeclaration[]): string {
  return parameters
    .filter((parameter) => parameter.slotOffset >= 0 && parameter.slotOffset < UNIFORM_SLOT_COUNT)
    .map((parameter) => `#define ${parameter.name} ${buildParameterAlias(parameter)}\n`)
    .join("");
}

/**
 * Assigns slot offsets in declaration order. Point2D starts on an even slot and
 * Color on a multiple of four. The first declaration that does not fit stops
 * packing and every declaration after it is dropped too.
 */
export function packParameters(declarations: readonly ParameterDeclaration[]): PackResult {
  const parameters: ParameterDeclaration[] = [];
  let cursor = 0;
  let overflowIndex = -1;

  for (let index = 0; index < declarations.length; index += 1) {
    const declaration = declarations[index];
    const offset = alignCursor(cursor, declaration.kind);
    const width = slotWidth(declaration.kind);
    if (offset + width > UNIFORM_SLOT_COUNT) {
      overflowIndex = index;
      break;
    }
    parameters.push(clonePacked(declaration, offset));
    cursor = offset + width;
  }

  const droppedNames = overflowIndex < 0 ? [] : declarations.slice(overflowIndex).map((entry) => entry.name);
  const diagnostic =
    droppedNames.length === 0
      ? null
      : `Parameter budget of ${UNIFORM_SLOT_COUNT} floats exceeded at '${droppedNames[0]}'; dropped ${droppedNames
          .map((name) => `'${name}'`)
          .join(", ")}.`;

  return {
    parameters,
    aliasText: buildAliasText(parameters),
    droppedNames,
    diagnostic
  };
}

/** Lays the current values of packed parameters out as the 16-float uniform region. */
export function packUniformRegion(parameters: readonly ParameterDeclaration[]): Float32Array {
  const region = new Float32Array(UNIFORM_SLOT_COUNT);
  for (const parameter of parameters) {
    if (parameter.slotOffset < 0) {
      continue;
    }
    const width = slotWidth(parameter.kind);
    if (parameter.slotOffset + width > UNIFORM_SLOT_COUNT) {
      continue;
    }
    for (let i = 0; i < width; i += 1) {
      region[parameter.slotOffset + i] = parameter.value[i];
    }
  }
  return region;
}
