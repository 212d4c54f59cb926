import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileOutputWriter } from "../../../src/newsletter/core/output.js";
import { ImageStore } from "../../../src/newsletter/store/images.js";

describe("ImageStore", () => {
  let tmpDir: string;
  let store: ImageStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "newsletter-images-"));
    store = new ImageStore(new FileOutputWriter(tmpDir), "/static/newsletters/");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("saves bytes and returns the public path", async () => {
    const publicPath = await store.save("a.png", Buffer.from([1, 2, 3]));

    expect(publicPath).toBe("/static/newsletters/a.png");
    expect(fs.readFileSync(path.join(tmpDir, "a.png"))).toEqual(Buffer.from([1, 2, 3]));
    expect(fs.existsSync(path.join(tmpDir, "a.png"))).toBe(true);
  });

  it("removes files and tolerates missing ones", async () => {
    await store.save("a.png", Buffer.from("x"));
    await store.remove("a.png");
    await store.remove("never-written.png");

    expect(fs.existsSync(path.join(tmpDir, "a.png"))).toBe(false);
  });

  it("refuses names that escape the directory", async () => {
    await expect(store.save("../evil.png", Buffer.from("x"))).rejects.toThrow(
      "Refusing to write outside",
    );
  });
});
