import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { decodeImageDataUrl, removeMediaFile, saveRecipeImage } from "../../src/media.js";

describe("decodeImageDataUrl", () => {
  it("decodes a base64 image", () => {
    const decoded = decodeImageDataUrl("data:image/JPEG;base64,aGVsbG8=");
    expect(decoded?.extension).toBe("jpeg");
    expect(decoded?.data.toString("utf-8")).toBe("hello");
  });

  it("rejects other types and malformed input", () => {
    expect(decodeImageDataUrl("data:image/svg+xml;base64,aGVsbG8=")).toBeNull();
    expect(decodeImageDataUrl("data:text/plain;base64,aGVsbG8=")).toBeNull();
    expect(decodeImageDataUrl("https://example.com/cat.png")).toBeNull();
    expect(decodeImageDataUrl("data:image/png;base64,")).toBeNull();
    expect(decodeImageDataUrl(42)).toBeNull();
  });
});

describe("recipe image storage", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "foodgram-media-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("writes under recipes/images and removes again", async () => {
    const relPath = await saveRecipeImage(root, { extension: "png", data: Buffer.from("pixels") });

    expect(relPath).toMatch(/^recipes\/images\/[0-9a-f-]{36}\.png$/);
    await expect(readFile(join(root, relPath), "utf-8")).resolves.toBe("pixels");

    await removeMediaFile(root, relPath);
    await expect(stat(join(root, relPath))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("ignores removing a file that is already gone", async () => {
    await expect(removeMediaFile(root, "recipes/images/missing.png")).resolves.toBeUndefined();
  });
});
