import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { renderFile } from "../src/renderer.js";
import { makeTempDir } from "./helpers.js";

describe("renderFile", () => {
  it("renders an existing file", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "a.md");
    await fs.writeFile(file, "# Title\n\nBody");

    const outcome = await renderFile(file);

    expect(outcome.status).toBe("rendered");
    if (outcome.status === "rendered") {
      expect(outcome.html).toContain('<h1 id="title">Title</h1>');
      expect(outcome.html).toContain("<p>Body</p>");
    }
  });

  it("reports a missing file apart from other failures", async () => {
    const dir = await makeTempDir();

    const outcome = await renderFile(path.join(dir, "gone.md"));

    expect(outcome.status).toBe("missing");
    if (outcome.status === "missing") {
      expect(outcome.error.message).toMatch(/^failed to read file: ENOENT/);
    }
  });

  it("reports unreadable paths as failures", async () => {
    const dir = await makeTempDir();

    const outcome = await renderFile(dir);

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") {
      expect(outcome.error.message).toMatch(/^failed to read file: EISDIR/);
    }
  });
});
