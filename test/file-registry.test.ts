import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { WatchFunction } from "../src/change-detector.js";
import { RegistryError } from "../src/errors.js";
import { FileRegistry } from "../src/file-registry.js";
import { INDEX_SCOPE, NotificationHub } from "../src/notification-hub.js";
import { fakeWatch, makeTempDir, rendered, scriptedRenderer } from "./helpers.js";

const TIMING = { debounceMs: 10, retryAttempts: 2, retryDelayMs: 5 };

describe("FileRegistry", () => {
  let hub: NotificationHub;
  let registry: FileRegistry | undefined;

  beforeEach(() => {
    hub = new NotificationHub();
  });

  afterEach(() => {
    registry?.close();
    registry = undefined;
  });

  it("renders a file and starts tracking it", async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, "hello.md");
    await fs.writeFile(file, "# Hello\n");
    const { watch, watchers } = fakeWatch();
    registry = new FileRegistry({ hub, watch });

    expect(await registry.add(file)).toBe(true);

    expect(registry.get(file)?.html).toContain('<h1 id="hello">Hello</h1>');
    expect(registry.list()).toEqual([file]);
    expect(registry.size).toBe(1);
    expect(watchers.map((watcher) => watcher.directory)).toEqual([dir]);
  });

  it("announces new files on the index feed", async () => {
    const index = hub.subscribe(INDEX_SCOPE);
    registry = new FileRegistry({
      hub,
      renderer: scriptedRenderer(rendered("<p>a</p>")),
      watch: fakeWatch().watch,
    });

    await registry.add("/docs/a.md");

    expect(await index.next()).toBe("reload");
  });

  it("does nothing when the file is already tracked", async () => {
    const renderer = scriptedRenderer(rendered("<p>a</p>"));
    const { watch, watchers } = fakeWatch();
    registry = new FileRegistry({ hub, renderer, watch });

    expect(await registry.add("/docs/a.md")).toBe(true);
    expect(await registry.add("/docs/a.md")).toBe(false);

    expect(renderer.calls).toEqual(["/docs/a.md"]);
    expect(watchers).toHaveLength(1);
  });

  it("sets a file up once when added concurrently", async () => {
    const renderer = scriptedRenderer(rendered("<p>a</p>"));
    const { watch, watchers } = fakeWatch();
    registry = new FileRegistry({ hub, renderer, watch });

    const results = await Promise.all([registry.add("/docs/a.md"), registry.add("/docs/a.md")]);

    expect(results).toEqual([true, false]);
    expect(renderer.calls).toHaveLength(1);
    expect(watchers).toHaveLength(1);
  });

  it("leaves no trace when the first render fails", async () => {
    const renderer = scriptedRenderer({ status: "failed", error: new Error("EACCES") });
    const { watch, watchers } = fakeWatch();
    registry = new FileRegistry({ hub, renderer, watch });

    const adding = registry.add("/docs/a.md");

    await expect(adding).rejects.toThrow(RegistryError);
    await expect(adding).rejects.toThrow("failed to render file: EACCES");
    expect(registry.has("/docs/a.md")).toBe(false);
    expect(registry.list()).toEqual([]);
    expect(watchers).toHaveLength(0);
  });

  it("leaves no trace when the watch cannot start", async () => {
    const watch: WatchFunction = () => {
      throw new Error("ENOSPC");
    };
    registry = new FileRegistry({
      hub,
      renderer: scriptedRenderer(rendered("<p>a</p>")),
      watch,
    });

    await expect(registry.add("/docs/a.md")).rejects.toThrow(
      "failed to start watching file: ENOSPC",
    );
    expect(registry.get("/docs/a.md")).toBeUndefined();
  });

  it("can add a file again after a failed attempt", async () => {
    const renderer = scriptedRenderer(
      { status: "missing", error: new Error("ENOENT") },
      rendered("<p>back</p>"),
    );
    registry = new FileRegistry({ hub, renderer, watch: fakeWatch().watch });

    await expect(registry.add("/docs/a.md")).rejects.toThrow(RegistryError);
    expect(await registry.add("/docs/a.md")).toBe(true);
    expect(registry.get("/docs/a.md")?.html).toBe("<p>back</p>");
  });

  it("keeps the stored html current after a change", async () => {
    const renderer = scriptedRenderer(rendered("<p>v1</p>"), rendered("<p>v2</p>"));
    const { watch, watchers } = fakeWatch();
    registry = new FileRegistry({ hub, renderer, watch, timing: TIMING });
    await registry.add("/docs/a.md");
    const before = registry.get("/docs/a.md")?.renderedAt;

    watchers[0]?.emitChange("a.md");

    await vi.waitFor(() => expect(registry?.get("/docs/a.md")?.html).toBe("<p>v2</p>"));
    expect(registry.get("/docs/a.md")?.detector?.reloadCount).toBe(1);
    expect(registry.get("/docs/a.md")?.renderedAt.getTime()).toBeGreaterThanOrEqual(
      before?.getTime() ?? 0,
    );
  });

  it("lists tracked files in order", async () => {
    registry = new FileRegistry({
      hub,
      renderer: scriptedRenderer(rendered("<p>x</p>")),
      watch: fakeWatch().watch,
    });

    await registry.add("/docs/b.md");
    await registry.add("/docs/a.md");

    expect(registry.list()).toEqual(["/docs/a.md", "/docs/b.md"]);
  });

  it("stops every watcher on close", async () => {
    const { watch, watchers } = fakeWatch();
    registry = new FileRegistry({ hub, renderer: scriptedRenderer(rendered("")), watch });
    await registry.add("/docs/a.md");
    await registry.add("/docs/b.md");

    registry.close();

    expect(watchers.every((watcher) => watcher.closed)).toBe(true);
    expect(registry.list()).toEqual([]);
  });
});
