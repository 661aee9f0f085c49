import { slotWidth } from "./uniformPacker";
import type { ParameterDeclaration, ParameterValueMap, ParameterVector } from "./types";

export type ParameterInput = number | boolean | readonly number[];

function clamp(value: number, min: number, max: number): number {
  const low = Math.min(min, max);
  const high = Math.max(min, max);
  return Math.max(low, Math.min(high, value));
}

function toComponents(input: ParameterInput): number[] {
  if (typeof input === "boolean") {
    return [input ? 1 : 0];
  }
  if (typeof input === "number") {
    return [input];
  }
  return [...input];
}

/**
 * Writes `input` over a copy of the parameter's current value, sanitized for
 * its kind. Components that are missing or not finite keep their current value.
 */
export function sanitizeParameterValue(parameter: ParameterDeclaration, input: ParameterInput): ParameterVector {
  const next: ParameterVector = [...parameter.value];
  const components = toComponents(input);
  const width = slotWidth(parameter.kind);

  for (let i = 0; i < width && i < components.length; i += 1) {
    const component = components[i];
    if (!Number.isFinite(component)) {
      continue;
    }
    switch (parameter.kind) {
      case "toggle":
      case "trigger":
        next[i] = component > 0.5 ? 1 : 0;
        break;
      case "enum":
        next[i] =
          parameter.enumLabels.length > 0
            ? clamp(Math.round(component), 0, parameter.enumLabels.length - 1)
            : clamp(Math.round(component), parameter.min, parameter.max);
        break;
      default:
        next[i] = clamp(component, parameter.min, parameter.max);
    }
  }
  return next;
}

export function snapshotParameterValues(parameters: readonly ParameterDeclaration[]): ParameterValueMap {
  const values: ParameterValueMap = {};
  for (const parameter of parameters) {
    values[parameter.name] = parameter.value.slice(0, slotWidth(parameter.kind));
  }
  return values;
}

/**
 * Patches freshly parsed declarations with previous values matched by name.
 * Shared by recompile, hot reload and loading persisted values. Triggers always
 * restart at zero.
 */
export function applyParameterValues(
  parameters: readonly ParameterDeclaration[],
  previousByName: ParameterValueMap | null
): ParameterDeclaration[] {
  return parameters.map((parameter): ParameterDeclaration => {
    const previous =
      previousByName !== null && Object.hasOwn(previousByName, parameter.name) ? previousByName[parameter.name] : undefined;
    if (previous === undefined || parameter.kind === "trigger") {
      return parameter;
    }
    return { ...parameter, value: sanitizeParameterValue(parameter, previous) };
  });
}

export function resetParameterValues(parameters: readonly ParameterDeclaration[]): ParameterDeclaration[] {
  return parameters.map((parameter): ParameterDeclaration => ({ ...parameter, value: [...parameter.defaultValue] }));
}
