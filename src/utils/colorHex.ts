export type Rgb = [number, number, number];

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** `#rrggbb` for the first three components of a color value. */
export function vectorToHexColor(value: readonly number[]): string {
  const toHex = (component: number | undefined): string =>
    Math.round(clamp01(component ?? 0) * 255)
      .toString(16)
      .padStart(2, "0");
  return `#${toHex(value[0])}${toHex(value[1])}${toHex(value[2])}`;
}

export function parseHexColor(colorHex: string): Rgb | null {
  const match = /^#?([0-9a-fA-F]{6})$/.exec(colorHex.trim());
  if (match === null) {
    return null;
  }
  const digits = match[1];
  return [
    parseInt(digits.slice(0, 2), 16) / 255,
    parseInt(digits.slice(2, 4), 16) / 255,
    parseInt(digits.slice(4, 6), 16) / 255
  ];
}

/** Replaces the RGB of `value` with a picked hex color, keeping alpha. */
export function applyHexColor(value: readonly number[], colorHex: string): number[] | null {
  const rgb = parseHexColor(colorHex);
  if (rgb === null) {
    return null;
  }
  return [rgb[0], rgb[1], rgb[2], value[3] ?? 1];
}
