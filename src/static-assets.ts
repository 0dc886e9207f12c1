import fs from "node:fs/promises";
import path from "node:path";

const CONTENT_TYPES: Record<string, string> = {
  ".apng": "image/apng",
  ".avif": "image/avif",
  ".css": "text/css; charset=utf-8",
  ".gif": "image/gif",
  ".htm": "text/html; charset=utf-8",
  ".html": "text/html; charset=utf-8",
  ".ico": "image/x-icon",
  ".jpeg": "image/jpeg",
  ".jpg": "image/jpeg",
  ".js": "application/javascript; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".md": "text/markdown; charset=utf-8",
  ".mp4": "video/mp4",
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".txt": "text/plain; charset=utf-8",
  ".webm": "video/webm",
  ".webp": "image/webp",
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/** True when `candidate` is `directory` itself or lies somewhere below it. */
export function isPathWithinDirectory(candidate: string, directory: string): boolean {
  const relative = path.relative(path.resolve(directory), path.resolve(candidate));
  if (relative === "") {
    return true;
  }
  return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

/**
 * Maps a request path such as `/images/logo.png` to a file next to the
 * Markdown document. The path is tried relative to the document's directory
 * first, then as an absolute path (Markdown that links to `/home/me/notes/a.png`).
 * Either way the result must stay inside the document's directory, and it
 * must be an existing regular file.
 */
export async function resolveAssetPath(
  markdownFile: string,
  requestPath: string,
): Promise<string | undefined> {
  const assetPath = safeDecode(requestPath).replace(/^\/+/, "");
  if (assetPath === "" || assetPath.includes("\0")) {
    return undefined;
  }

  const markdownDir = path.dirname(markdownFile);
  const candidates = [
    path.join(markdownDir, assetPath),
    path.resolve("/", assetPath),
  ].filter((candidate) => isPathWithinDirectory(candidate, markdownDir));

  for (const candidate of candidates) {
    if (await isRegularFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
