import { describe, expect, it } from "vitest";
import {
  containsDestructiveKeyword,
  countCodeIndicators,
  countImportantPatterns,
  matchesImportantPattern,
} from "./patterns.js";

describe("countCodeIndicators", () => {
  it("counts each indicator once, case-insensitively", () => {
    // "def ", "import ", "from ", ".py"
    expect(countCodeIndicators("import os\nfrom pathlib import Path\nDEF main(): pass  # main.py")).toBe(4);
  });

  it("returns 0 for prose", () => {
    expect(countCodeIndicators("Thanks, that worked")).toBe(0);
  });

  it("matches the short .c suffix inside longer extensions", () => {
    // ".cpp" and ".c"
    expect(countCodeIndicators("build main.cpp")).toBe(2);
  });
});

describe("countImportantPatterns", () => {
  it("counts distinct pattern families", () => {
    // error family and credential family
    expect(countImportantPatterns("Error: connection failed; check the API key")).toBe(2);
  });

  it("counts every family once", () => {
    expect(countImportantPatterns("ERROR critical TODO password def foo")).toBe(5);
  });

  it("recognizes Portuguese markers", () => {
    expect(countImportantPatterns("Atenção: falha no deploy")).toBe(2);
  });
});

describe("matchesImportantPattern", () => {
  it("matches declarations", () => {
    expect(matchesImportantPattern("class Parser extends Base")).toBe(true);
  });

  it("ignores plain text", () => {
    expect(matchesImportantPattern("Question 4")).toBe(false);
  });
});

describe("containsDestructiveKeyword", () => {
  it.each(["DELETE the cache", "remove old builds", "drop table users"])("flags %s", (text) => {
    expect(containsDestructiveKeyword(text)).toBe(true);
  });

  it("ignores safe operations", () => {
    expect(containsDestructiveKeyword("list the files")).toBe(false);
  });
});
