export interface ShaderFileSystem {
  readText(path: string): string | null;
  modifiedTime(path: string): number | null;
  listFiles(directory: string): string[];
}

export interface WritableShaderFileSystem extends ShaderFileSystem {
  writeText(path: string, text: string): void;
}

export const SHADER_FILE_EXTENSIONS = [".glsl", ".frag", ".fs"] as const;

function normalizePath(path: string): string {
  return path.replace(/\\/g, "/").replace(/\/+$/, "");
}

export function baseNameWithoutExtension(path: string): string {
  const normalized = normalizePath(path);
  const fileName = normalized.slice(normalized.lastIndexOf("/") + 1);
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}

export function isShaderFilePath(path: string): boolean {
  const lower = path.toLowerCase();
  return SHADER_FILE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}

/**
 * Shader library held in memory (and persisted by the app). Modification
 * times are a revision counter, bumped on every write.
 */
export class MemoryShaderFileSystem implements WritableShaderFileSystem {
  private readonly files = new Map<string, { text: string; revision: number }>();

  private revision = 0;

  constructor(initialFiles: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(initialFiles)) {
      this.writeText(path, text);
    }
  }

  readText(path: string): string | null {
    return this.files.get(normalizePath(path))?.text ?? null;
  }

  modifiedTime(path: string): number | null {
    return this.files.get(normalizePath(path))?.revision ?? null;
  }

  listFiles(directory: string): string[] {
    const prefix = `${normalizePath(directory)}/`;
    return [...this.files.keys()]
      .filter((path) => path.startsWith(prefix) && !path.slice(prefix.length).includes("/"))
      .sort();
  }

  writeText(path: string, text: string): void {
    this.revision += 1;
    this.files.set(normalizePath(path), { text, revision: this.revision });
  }

  deleteFile(path: string): void {
    this.files.delete(normalizePath(path));
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries([...this.files.entries()].map(([path, entry]) => [path, entry.text]));
  }
}
