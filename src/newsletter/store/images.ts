import type { OutputWriter } from "../core/types.js";

/**
 * Image asset directory. Files are served externally under `urlPrefix`;
 * names are unique per write, so nothing here ever overwrites.
 */
export class ImageStore {
  private readonly writer: OutputWriter;
  private readonly urlPrefix: string;

  constructor(writer: OutputWriter, urlPrefix: string) {
    this.writer = writer;
    this.urlPrefix = urlPrefix.replace(/\/+$/, "");
  }

  publicPath(fileName: string): string {
    return `${this.urlPrefix}/${fileName}`;
  }

  async save(fileName: string, bytes: Buffer): Promise<string> {
    await this.writer.writeBinary(fileName, bytes);
    return this.publicPath(fileName);
  }

  async remove(fileName: string): Promise<void> {
    await this.writer.remove(fileName);
  }
}
