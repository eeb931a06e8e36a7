/**
 * pkgdex Catalog — Version Ordering Tests
 */

import { describe, it, expect } from "vitest";
import { compareVersions, parseVersion, sortVersionsDescending } from "../src/version";

describe("parseVersion", () => {
  it("splits dotted releases into numbers", () => {
    expect(parseVersion("1.1.5")).toEqual([1, 1, 5]);
  });

  it("splits letters from digits", () => {
    expect(parseVersion("2.0rc1")).toEqual([2, 0, "rc", 1]);
  });

  it("ignores separators", () => {
    expect(parseVersion("0.7-beta_2")).toEqual([0, 7, "beta", 2]);
  });
});

describe("compareVersions", () => {
  it("compares numeric components as numbers", () => {
    expect(compareVersions("1.10", "1.9")).toBe(1);
    expect(compareVersions("1.9", "1.10")).toBe(-1);
  });

  it("returns 0 only for identical strings", () => {
    expect(compareVersions("3.5.1", "3.5.1")).toBe(0);
  });

  it("ranks the longer version higher when one is a prefix of the other", () => {
    expect(compareVersions("1.0", "1.0.1")).toBe(-1);
  });

  it("ranks a number above a word in the same position", () => {
    expect(compareVersions("1.0", "1.a")).toBe(1);
  });

  it("ranks branch versions above every release", () => {
    expect(compareVersions("master", "99.0")).toBe(1);
    expect(compareVersions("1.0", "develop")).toBe(-1);
  });
});

describe("sortVersionsDescending", () => {
  it("orders newest first and drops duplicates", () => {
    expect(sortVersionsDescending(["3.5.1", "3.10.0", "master", "3.4.4", "3.5.1"])).toEqual([
      "master",
      "3.10.0",
      "3.5.1",
      "3.4.4",
    ]);
  });

  it("returns an empty list for no versions", () => {
    expect(sortVersionsDescending([])).toEqual([]);
  });
});
