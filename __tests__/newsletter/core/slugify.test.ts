import { describe, expect, it } from "vitest";
import { messageSlug, slugify } from "../../../src/newsletter/core/slugify.js";

describe("slugify", () => {
  it("converts basic text to slug", () => {
    expect(slugify("Hello World")).toBe("hello-world");
  });

  it("handles special characters", () => {
    expect(slugify("Hello! @World #2024")).toBe("hello-world-2024");
  });

  it("handles diacritics", () => {
    expect(slugify("Café résumé")).toBe("cafe-resume");
  });

  it("trims leading and trailing hyphens", () => {
    expect(slugify("--hello world--")).toBe("hello-world");
  });

  it("respects max length without a trailing hyphen", () => {
    expect(slugify("abc def", 4)).toBe("abc");
  });

  it("handles all special characters", () => {
    expect(slugify("!@#$%^&*()")).toBe("");
  });
});

describe("messageSlug", () => {
  it("keeps the last alphanumeric characters", () => {
    expect(messageSlug("AAMkAGI2TG93AAA=/+abcDEF123456")).toBe("3AAAabcDEF123456");
  });

  it("shortens to the requested length", () => {
    expect(messageSlug("abcdef", 3)).toBe("def");
  });

  it("falls back when nothing is usable", () => {
    expect(messageSlug("==/+")).toBe("message");
  });
});
