import type { SourceLineRef } from "./shaderComposer";

export type ShaderLogSeverity = "error" | "warning" | "note";

export interface ShaderLogEntry {
  severity: ShaderLogSeverity;
  /** Line in the composed shader, as reported by the driver. */
  line: number | null;
  /** Line in the effect source (or alias block) the composed line came from. */
  location: SourceLineRef | null;
  message: string;
}

// e.g. "ERROR: 0:12: 'foo' : undeclared identifier"
const LOG_LINE_RE = /^(ERROR|WARNING)\s*:\s*\d+\s*:\s*(\d+)\s*:\s*(.*)$/i;

export function readShaderLog(log: string, lineMap: ReadonlyArray<SourceLineRef | null> = []): ShaderLogEntry[] {
  const entries: ShaderLogEntry[] = [];
  for (const rawLine of log.split(/\r\n|\r|\n/)) {
    const text = rawLine.replace(/\0/g, "").trim();
    if (text.length === 0) {
      continue;
    }
    const match = LOG_LINE_RE.exec(text);
    if (match === null) {
      entries.push({ severity: "note", line: null, location: null, message: text });
      continue;
    }
    const line = Number(match[2]);
    entries.push({
      severity: match[1].toUpperCase() === "WARNING" ? "warning" : "error",
      line,
      location: line >= 1 && line <= lineMap.length ? lineMap[line - 1] : null,
      message: match[3].trim()
    });
  }
  return entries;
}

export function formatShaderLogEntry(entry: ShaderLogEntry): string {
  if (entry.severity === "note") {
    return entry.message;
  }
  const where =
    entry.location !== null
      ? `${entry.location.path}:${entry.location.line}`
      : entry.line !== null
        ? `glsl:${entry.line}`
        : "glsl";
  const tag = entry.severity === "warning" ? "warning: " : "";
  return `${where}: ${tag}${entry.message}`;
}

/** Compiler log rewritten against the effect source, one entry per line. */
export function describeCompileFailure(log: string, lineMap: ReadonlyArray<SourceLineRef | null>): string {
  const entries = readShaderLog(log, lineMap);
  if (entries.length === 0) {
    return "Unknown GLSL compile error.";
  }
  return entries.map(formatShaderLogEntry).join("\n");
}
