import { mkdir, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";

export interface StorageConfig {
  resultsDir: string;
  audioDir: string;
}

export class ArtifactExistsError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Artifact already exists: ${path}`);
    this.name = "ArtifactExistsError";
    this.path = path;
  }
}

/**
 * Write-once artifact storage on the local filesystem. Every write uses
 * the exclusive-create flag; an existing file is never replaced.
 */
export class LocalArtifactStore {
  readonly resultsDir: string;
  readonly audioDir: string;

  constructor(config: StorageConfig) {
    this.resultsDir = resolve(config.resultsDir);
    this.audioDir = resolve(config.audioDir);
  }

  async writeResult(name: string, data: unknown): Promise<string> {
    const body = `${JSON.stringify(data, null, 2)}\n`;
    return this.writeOnce(this.resultsDir, `${safeName(name)}.json`, body);
  }

  async writeAudio(name: string, pcm: Buffer, extension = "pcm"): Promise<string> {
    return this.writeOnce(this.audioDir, `${safeName(name)}.${extension}`, pcm);
  }

  /** Delete an artifact this store wrote. Missing files are ignored. */
  async remove(fullPath: string): Promise<void> {
    const target = resolve(fullPath);
    if (dirname(target) !== this.resultsDir && dirname(target) !== this.audioDir) {
      throw new Error(`Not an artifact of this store: ${fullPath}`);
    }
    await rm(target, { force: true });
  }

  private async writeOnce(dir: string, fileName: string, body: string | Buffer): Promise<string> {
    await mkdir(dir, { recursive: true });
    const fullPath = join(dir, fileName);
    try {
      await writeFile(fullPath, body, { flag: "wx" });
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        throw new ArtifactExistsError(fullPath);
      }
      throw err;
    }
    return fullPath;
  }
}

function safeName(name: string): string {
  const cleaned = basename(name).replace(/[^A-Za-z0-9._-]/g, "_");
  if (!cleaned || cleaned === "." || cleaned === "..") {
    throw new Error(`Invalid artifact name: ${name}`);
  }
  return cleaned;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
