import { describe, expect, test } from "vitest";
import { describeCompileFailure, formatShaderLogEntry, readShaderLog } from "../src/core/render/shaderDiagnostics";
import type { SourceLineRef } from "../src/core/render/shaderComposer";

const LINE_MAP: Array<SourceLineRef | null> = [
  ...Array.from({ length: 11 }, () => null),
  { path: "parameters", line: 1 },
  { path: "fx.glsl", line: 1 },
  { path: "fx.glsl", line: 2 }
];

describe("readShaderLog", () => {
  test("parses errors, warnings and free-form notes", () => {
    const entries = readShaderLog(
      "ERROR: 0:14: 'Gian' : undeclared identifier\nWARNING: 0:13: unused\nERROR: 1 compilation errors.\n\0",
      LINE_MAP
    );

    expect(entries).toEqual([
      { severity: "error", line: 14, location: { path: "fx.glsl", line: 2 }, message: "'Gian' : undeclared identifier" },
      { severity: "warning", line: 13, location: { path: "fx.glsl", line: 1 }, message: "unused" },
      { severity: "note", line: null, location: null, message: "ERROR: 1 compilation errors." }
    ]);
  });

  test("leaves lines outside the map unmapped", () => {
    const [entry] = readShaderLog("ERROR: 0:99: 'x' : syntax error", LINE_MAP);

    expect(entry.location).toBeNull();
    expect(formatShaderLogEntry(entry)).toBe("glsl:99: 'x' : syntax error");
  });
});

describe("describeCompileFailure", () => {
  test("rewrites every line against the effect source", () => {
    expect(
      describeCompileFailure("ERROR: 0:12: 'uParams' : syntax error\nWARNING: 0:13: unused", LINE_MAP)
    ).toBe("parameters:1: 'uParams' : syntax error\nfx.glsl:1: warning: unused");
  });

  test("reports an empty log as an unknown error", () => {
    expect(describeCompileFailure("", LINE_MAP)).toBe("Unknown GLSL compile error.");
  });
});
