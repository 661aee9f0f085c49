import { UNPACKED_SLOT, type ParameterDeclaration, type ParameterKind, type ParameterVector } from "./types";

const BLOCK_OPEN = "/*{";
const BLOCK_CLOSE = "}*/";
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const DEFAULT_MIN = 0.0;
const DEFAULT_MAX = 1.0;
const DEFAULT_STEP = 0.01;

// Canonical tags plus the names used by ISF-style headers.
const KIND_TAGS: Record<string, ParameterKind> = {
  scalar: "scalar",
  float: "scalar",
  toggle: "toggle",
  bool: "toggle",
  enum: "enum",
  long: "enum",
  color: "color",
  point2d: "point2d",
  trigger: "trigger",
  event: "trigger"
};

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Lower-cases keys so `NAME` and `name` style headers read the same. */
function normalizeKeys(entry: JsonRecord): JsonRecord {
  const normalized: JsonRecord = {};
  for (const [key, value] of Object.entries(entry)) {
    normalized[key.toLowerCase()] = value;
  }
  return normalized;
}

function readFiniteNumber(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function parseKind(raw: unknown): ParameterKind | null {
  if (typeof raw !== "string") {
    return null;
  }
  return KIND_TAGS[raw.trim().toLowerCase()] ?? null;
}

function parseDefault(raw: unknown): ParameterVector {
  const vector: ParameterVector = [0, 0, 0, 0];
  if (typeof raw === "boolean") {
    vector[0] = raw ? 1 : 0;
  } else if (typeof raw === "number" && Number.isFinite(raw)) {
    vector[0] = raw;
  } else if (Array.isArray(raw)) {
    const count = Math.min(raw.length, 4);
    for (let i = 0; i < count; i += 1) {
      vector[i] = readFiniteNumber(raw[i], 0);
    }
  }
  return vector;
}

function parseEnumLabels(raw: unknown): string[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.filter((entry): entry is string => typeof entry === "string");
}

function parseDeclaration(rawEntry: unknown): ParameterDeclaration | null {
  if (!isRecord(rawEntry)) {
    return null;
  }
  const entry = normalizeKeys(rawEntry);
  const name = entry.name;
  if (typeof name !== "string" || !IDENTIFIER.test(name)) {
    return null;
  }
  const kind = parseKind(entry.kind ?? entry.type);
  if (kind === null) {
    return null;
  }

  const defaultValue = parseDefault(entry.default);
  return {
    name,
    label: typeof entry.label === "string" && entry.label.length > 0 ? entry.label : name,
    kind,
    value: [...defaultValue],
    defaultValue,
    min: readFiniteNumber(entry.min, DEFAULT_MIN),
    max: readFiniteNumber(entry.max, DEFAULT_MAX),
    step: readFiniteNumber(entry.step, DEFAULT_STEP),
    enumLabels: kind === "enum" ? parseEnumLabels(entry.values) : [],
    slotOffset: UNPACKED_SLOT
  };
}

/**
 * Returns the text between the first `/*{` and the next `}*\/`, re-wrapped in
 * braces, or null when the source has no declaration block.
 */
export function extractParameterBlock(source: string): string | null {
  const start = source.indexOf(BLOCK_OPEN);
  if (start < 0) {
    return null;
  }
  const bodyStart = start + BLOCK_OPEN.length;
  const end = source.indexOf(BLOCK_CLOSE, bodyStart);
  if (end < 0) {
    return null;
  }
  return `{${source.slice(bodyStart, end)}}`;
}

/**
 * Reads the `INPUTS` array of the embedded declaration block. A missing or
 * malformed block yields an empty list; the block itself stays in the source
 * because the shading compiler sees it as a comment.
 */
export function parseParameterDeclarations(source: string): ParameterDeclaration[] {
  const block = extractParameterBlock(source);
  if (block === null) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch {
    return [];
  }
  if (!isRecord(parsed)) {
    return [];
  }

  const inputs = parsed.INPUTS ?? parsed.inputs;
  if (!Array.isArray(inputs)) {
    return [];
  }

  const declarations: ParameterDeclaration[] = [];
  for (const rawEntry of inputs) {
    const declaration = parseDeclaration(rawEntry);
    if (declaration !== null) {
      declarations.push(declaration);
    }
  }
  return declarations;
}
