import fs from "node:fs/promises";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { contentTypeFor, isPathWithinDirectory, resolveAssetPath } from "../src/static-assets.js";
import { makeTempDir } from "./helpers.js";

describe("contentTypeFor", () => {
  it("maps known extensions regardless of case", () => {
    expect(contentTypeFor("/docs/logo.PNG")).toBe("image/png");
    expect(contentTypeFor("/docs/diagram.svg")).toBe("image/svg+xml");
    expect(contentTypeFor("/docs/style.css")).toBe("text/css; charset=utf-8");
  });

  it("falls back to octet-stream", () => {
    expect(contentTypeFor("/docs/archive.xyz")).toBe("application/octet-stream");
    expect(contentTypeFor("/docs/Makefile")).toBe("application/octet-stream");
  });
});

describe("isPathWithinDirectory", () => {
  it("accepts the directory and its descendants", () => {
    expect(isPathWithinDirectory("/docs", "/docs")).toBe(true);
    expect(isPathWithinDirectory("/docs/img/a.png", "/docs")).toBe(true);
    expect(isPathWithinDirectory("/docs/..notes", "/docs")).toBe(true);
  });

  it("rejects paths outside the directory", () => {
    expect(isPathWithinDirectory("/docs/../etc/passwd", "/docs")).toBe(false);
    expect(isPathWithinDirectory("/docs-other/a.png", "/docs")).toBe(false);
    expect(isPathWithinDirectory("/", "/docs")).toBe(false);
  });
});

describe("resolveAssetPath", () => {
  let root: string;
  let markdownFile: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await fs.mkdir(path.join(root, "docs", "img"), { recursive: true });
    markdownFile = path.join(root, "docs", "guide.md");
    await fs.writeFile(markdownFile, "# Guide\n");
    await fs.writeFile(path.join(root, "docs", "img", "logo.png"), "png");
    await fs.writeFile(path.join(root, "docs", "my image.png"), "png");
    await fs.writeFile(path.join(root, "secret.txt"), "secret");
  });

  it("resolves paths relative to the document", async () => {
    expect(await resolveAssetPath(markdownFile, "/img/logo.png")).toBe(
      path.join(root, "docs", "img", "logo.png"),
    );
  });

  it("decodes percent-encoded names", async () => {
    expect(await resolveAssetPath(markdownFile, "/my%20image.png")).toBe(
      path.join(root, "docs", "my image.png"),
    );
  });

  it("accepts absolute paths inside the document's directory", async () => {
    const absolute = path.join(root, "docs", "img", "logo.png");

    expect(await resolveAssetPath(markdownFile, absolute)).toBe(absolute);
  });

  it("refuses to leave the document's directory", async () => {
    expect(await resolveAssetPath(markdownFile, "/../secret.txt")).toBeUndefined();
    expect(await resolveAssetPath(markdownFile, "/..%2Fsecret.txt")).toBeUndefined();
    expect(await resolveAssetPath(markdownFile, path.join(root, "secret.txt"))).toBeUndefined();
  });

  it("ignores directories and missing files", async () => {
    expect(await resolveAssetPath(markdownFile, "/img")).toBeUndefined();
    expect(await resolveAssetPath(markdownFile, "/img/missing.png")).toBeUndefined();
    expect(await resolveAssetPath(markdownFile, "/")).toBeUndefined();
  });
});
