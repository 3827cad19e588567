import { describe, it, expect } from "vitest";
import { isSafeId, validateId } from "../../../src/utils/id.js";

describe("isSafeId", () => {
  it("accepts path-safe identifiers", () => {
    expect(isSafeId("6f1c2a9e-1b2c-4d5e-8f90-123456789abc")).toBe(true);
    expect(isSafeId("web_0.main")).toBe(true);
  });

  it("rejects traversal and separators", () => {
    expect(isSafeId("")).toBe(false);
    expect(isSafeId("..")).toBe(false);
    expect(isSafeId(".hidden")).toBe(false);
    expect(isSafeId("a/b")).toBe(false);
    expect(isSafeId("a b")).toBe(false);
  });
});

describe("validateId", () => {
  it("names the label in the error", () => {
    expect(() => validateId("../etc", "pod UID")).toThrow('invalid pod UID: "../etc"');
    expect(() => validateId("pod-A", "pod UID")).not.toThrow();
  });
});
