import { describe, expect, it } from "vitest";
import { fileUrl, indexUrl, parsePort } from "../src/config.js";

describe("parsePort", () => {
  it("accepts ports in range", () => {
    expect(parsePort("6333")).toBe(6333);
    expect(parsePort("1")).toBe(1);
    expect(parsePort("65535")).toBe(65535);
  });

  it("rejects ports out of range", () => {
    expect(() => parsePort("0")).toThrow("invalid port 0: must be between 1 and 65535");
    expect(() => parsePort("65536")).toThrow("invalid port 65536: must be between 1 and 65535");
  });

  it("rejects values that are not numbers", () => {
    expect(() => parsePort("web")).toThrow("invalid port 'web': must be a number");
    expect(() => parsePort("-1")).toThrow("invalid port '-1': must be a number");
    expect(() => parsePort("80.5")).toThrow("invalid port '80.5': must be a number");
  });
});

describe("preview URLs", () => {
  it("puts the file path into the query verbatim", () => {
    expect(fileUrl(6333, "/home/me/notes.md")).toBe(
      "http://127.0.0.1:6333/?file=/home/me/notes.md",
    );
  });

  it("points the index at the root", () => {
    expect(indexUrl(8080)).toBe("http://127.0.0.1:8080/");
  });
});
