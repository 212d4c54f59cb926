import * as fs from "node:fs";
import * as path from "node:path";
import { stringify as yamlStringify } from "yaml";
import { writeFileAtomic } from "./files.js";
import type { OutputWriter } from "./types.js";

export class FileOutputWriter implements OutputWriter {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = path.resolve(baseDir);
  }

  /** Resolve inside `baseDir`; a path that escapes it is a caller bug. */
  private resolve(relativePath: string): string {
    const filePath = path.resolve(this.baseDir, relativePath);
    if (!filePath.startsWith(this.baseDir + path.sep)) {
      throw new Error(`Refusing to write outside ${this.baseDir}: ${relativePath}`);
    }
    return filePath;
  }

  async writeDocument(
    relativePath: string,
    frontmatter: Record<string, unknown>,
    body: string,
  ): Promise<void> {
    const fm = yamlStringify(frontmatter).trim();
    writeFileAtomic(this.resolve(relativePath), `---\n${fm}\n---\n\n${body}`);
  }

  async writeBinary(relativePath: string, data: Buffer): Promise<void> {
    writeFileAtomic(this.resolve(relativePath), data);
  }

  async remove(relativePath: string): Promise<void> {
    fs.rmSync(this.resolve(relativePath), { force: true });
  }
}

export function createOutputWriter(baseDir: string): OutputWriter {
  return new FileOutputWriter(baseDir);
}
