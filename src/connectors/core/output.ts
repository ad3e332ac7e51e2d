import * as fs from "node:fs";
import * as path from "node:path";
import { FileSystemError } from "./errors.js";
import type { OutputWriter } from "./types.js";

const MAX_NAME_ATTEMPTS = 1000;

function withSuffix(fileName: string, n: number): string {
  if (n <= 1) return fileName;
  const ext = path.extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  return `${stem}_${n}${ext}`;
}

function isAlreadyExists(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "EEXIST"
  );
}

export class FileOutputWriter implements OutputWriter {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  private resolve(relativePath: string): string {
    return path.join(this.baseDir, relativePath);
  }

  /**
   * Create `filePath` exclusively and write `content` to it. Returns false
   * when the file already exists.
   */
  private exclusiveWrite(filePath: string, content: string): boolean {
    let fd: number;
    try {
      fd = fs.openSync(filePath, "wx");
    } catch (err) {
      if (isAlreadyExists(err)) return false;
      throw err;
    }
    try {
      fs.writeFileSync(fd, content, "utf-8");
    } finally {
      fs.closeSync(fd);
    }
    return true;
  }

  async writeExport(
    relativeDir: string,
    fileName: string,
    content: string,
  ): Promise<string> {
    const dir = this.resolve(relativeDir);
    let target = path.join(dir, fileName);
    try {
      fs.mkdirSync(dir, { recursive: true });
      for (let n = 1; n <= MAX_NAME_ATTEMPTS; n++) {
        target = path.join(dir, withSuffix(fileName, n));
        if (this.exclusiveWrite(target, content)) return target;
      }
    } catch (err) {
      throw new FileSystemError(target, err);
    }
    throw new FileSystemError(
      path.join(dir, fileName),
      new Error(`no free file name after ${MAX_NAME_ATTEMPTS} attempts`),
    );
  }
}

export function createOutputWriter(baseDir: string): OutputWriter {
  return new FileOutputWriter(baseDir);
}
