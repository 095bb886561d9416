import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

export const RECIPE_IMAGE_DIR = "recipes/images";

const IMAGE_TYPES: Record<string, string> = {
  png: "png",
  jpeg: "jpeg",
  jpg: "jpg",
  gif: "gif",
  webp: "webp",
};

export interface DecodedImage {
  extension: string;
  data: Buffer;
}

/** Decodes `data:image/<type>;base64,<payload>`; null for anything else. */
export function decodeImageDataUrl(value: unknown): DecodedImage | null {
  if (typeof value !== "string") return null;
  const match = /^data:image\/([a-z0-9.+-]+);base64,([A-Za-z0-9+/=\s]+)$/i.exec(value);
  if (!match) return null;

  const extension = IMAGE_TYPES[match[1].toLowerCase()];
  if (!extension) return null;

  const data = Buffer.from(match[2].replace(/\s/g, ""), "base64");
  return data.length > 0 ? { extension, data } : null;
}

/** Writes the image under the media root and returns its path relative to it. */
export async function saveRecipeImage(root: string, image: DecodedImage): Promise<string> {
  const relPath = `${RECIPE_IMAGE_DIR}/${randomUUID()}.${image.extension}`;
  const absolute = join(root, relPath);
  await mkdir(dirname(absolute), { recursive: true });
  await writeFile(absolute, image.data);
  return relPath;
}

export async function removeMediaFile(root: string, relPath: string): Promise<void> {
  await rm(join(root, relPath), { force: true });
}
