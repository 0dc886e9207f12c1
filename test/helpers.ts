import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { FileWatcher, WatchFunction, WatchListener } from "../src/change-detector.js";
import type { RenderOutcome, Renderer } from "../src/renderer.js";

export class FakeWatcher extends EventEmitter implements FileWatcher {
  closed = false;

  constructor(
    readonly directory: string,
    readonly listener: WatchListener,
  ) {
    super();
  }

  emitChange(fileName: string | null, eventType = "change"): void {
    this.listener(eventType, fileName);
  }

  close(): void {
    this.closed = true;
  }
}

export function fakeWatch(): { watch: WatchFunction; watchers: FakeWatcher[] } {
  const watchers: FakeWatcher[] = [];
  const watch: WatchFunction = (directory, listener) => {
    const watcher = new FakeWatcher(directory, listener);
    watchers.push(watcher);
    return watcher;
  };
  return { watch, watchers };
}

/** Renderer that replays `outcomes` in order and repeats the last one. */
export function scriptedRenderer(...outcomes: RenderOutcome[]): Renderer & { calls: string[] } {
  const calls: string[] = [];
  const render = async (filePath: string): Promise<RenderOutcome> => {
    calls.push(filePath);
    const outcome = outcomes[Math.min(calls.length, outcomes.length) - 1];
    if (!outcome) {
      throw new Error("no scripted outcome");
    }
    return outcome;
  };
  return Object.assign(render, { calls });
}

export function rendered(html: string): RenderOutcome {
  return { status: "rendered", html };
}

export function missing(): RenderOutcome {
  return { status: "missing", error: new Error("failed to read file: ENOENT") };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/** Short-lived directory; kept short because socket paths have a length limit. */
export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "lum-"));
}
