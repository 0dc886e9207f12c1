import fs from "node:fs/promises";
import { hasErrorCode, toError } from "./errors.js";
import { renderMarkdown } from "./markdown.js";

/**
 * Result of rendering one file. `missing` is kept apart from other failures
 * because editors briefly remove the file while saving it atomically.
 */
export type RenderOutcome =
  | { status: "rendered"; html: string }
  | { status: "missing"; error: Error }
  | { status: "failed"; error: Error };

export type Renderer = (filePath: string) => Promise<RenderOutcome>;

export const renderFile: Renderer = async (filePath) => {
  let source: string;
  try {
    source = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const failure = new Error(`failed to read file: ${toError(error).message}`, {
      cause: error,
    });
    return hasErrorCode(error, "ENOENT")
      ? { status: "missing", error: failure }
      : { status: "failed", error: failure };
  }

  try {
    return { status: "rendered", html: renderMarkdown(source) };
  } catch (error) {
    return {
      status: "failed",
      error: new Error(`failed to convert markdown: ${toError(error).message}`, {
        cause: error,
      }),
    };
  }
};
