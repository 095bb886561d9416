import { stat } from "node:fs/promises";
import { join, relative, sep } from "node:path";

export const SPA_INDEX = "index.html";
export const DOCS_INDEX = "redoc.html";

/** A file to send, as a path relative to its root. */
export interface StaticTarget {
  root: string;
  file: string;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR" || err.code === "ENAMETOOLONG")
  );
}

/** Joins a normalised request path onto root; null if the result leaves root. */
export function resolveUnderRoot(root: string, path: string): string | null {
  const absolute = join(root, path);
  const rel = relative(root, absolute);
  if (rel === "") return absolute;
  if (rel === ".." || rel.startsWith(`..${sep}`)) return null;
  return absolute;
}

function target(root: string, absolute: string): StaticTarget {
  return { root, file: relative(root, absolute).split(sep).join("/") };
}

/**
 * `try_files $uri <docs>/redoc.html`: the exact file under the docs root,
 * else the ReDoc page.
 */
export async function lookupDocsFile(docsRoot: string, pathInDocs: string): Promise<StaticTarget | null> {
  const candidate = resolveUnderRoot(docsRoot, pathInDocs);
  if (candidate && (await isFile(candidate))) return target(docsRoot, candidate);

  const index = join(docsRoot, DOCS_INDEX);
  return (await isFile(index)) ? target(docsRoot, index) : null;
}

/**
 * `try_files $uri $uri/ /index.html`: the file, then the directory's index,
 * then the application's root index.
 */
export async function lookupSpaFile(staticRoot: string, path: string): Promise<StaticTarget | null> {
  const candidate = resolveUnderRoot(staticRoot, path);
  if (candidate) {
    if (await isFile(candidate)) return target(staticRoot, candidate);
    if (await isDirectory(candidate)) {
      const directoryIndex = join(candidate, SPA_INDEX);
      if (await isFile(directoryIndex)) return target(staticRoot, directoryIndex);
    }
  }

  const index = join(staticRoot, SPA_INDEX);
  return (await isFile(index)) ? target(staticRoot, index) : null;
}
