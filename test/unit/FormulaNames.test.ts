/**
 * Unit tests for formula naming and the stub formula template.
 *
 * @module
 */

import { describe, it, expect } from "vitest";
import { deriveFormulaName, formulaClassName } from "../../src/core/formula/FormulaNames.js";
import {
  PLACEHOLDER_HOMEPAGE,
  PLACEHOLDER_URL,
  renderStubFormula,
} from "../../src/core/formula/FormulaTemplate.js";

describe("deriveFormulaName", () => {
  it("strips the version and archive extension", () => {
    expect(deriveFormulaName("https://example.com/dl/mytool-1.2.3.tar.gz")).toBe("mytool");
  });

  it("strips a v-prefixed version", () => {
    expect(deriveFormulaName("https://example.com/dl/mytool-v2.0.zip")).toBe("mytool");
  });

  it("ignores query strings and fragments", () => {
    expect(deriveFormulaName("https://example.com/dl/mytool-1.0.tgz?token=x#frag")).toBe("mytool");
  });

  it("keeps dashes that are part of the name", () => {
    expect(deriveFormulaName("https://example.com/dl/my-cool-tool-0.9.tar.xz")).toBe("my-cool-tool");
  });

  it("keeps a name without a version", () => {
    expect(deriveFormulaName("https://example.com/dl/mytool.tar.bz2")).toBe("mytool");
  });

  it("returns null when nothing usable remains", () => {
    expect(deriveFormulaName("https://example.com/dl/")).toBeNull();
    expect(deriveFormulaName("")).toBeNull();
  });
});

describe("formulaClassName", () => {
  it("camel-cases dashed and underscored names", () => {
    expect(formulaClassName("my-cool_tool")).toBe("MyCoolTool");
  });

  it("capitalises a single word", () => {
    expect(formulaClassName("tools")).toBe("Tools");
  });
});

describe("renderStubFormula", () => {
  it("renders the class, URL and homepage", () => {
    const content = renderStubFormula({
      name: "my-tool",
      url: "https://example.com/my-tool-1.0.tar.gz",
      homepage: "https://example.com/my-tool",
    });

    const lines = content.split("\n");
    expect(lines[0]).toBe("class MyTool < Formula");
    expect(lines).toContain('  homepage "https://example.com/my-tool"');
    expect(lines).toContain('  url "https://example.com/my-tool-1.0.tar.gz"');
  });

  it("uses placeholders when no URL is known", () => {
    const lines = renderStubFormula({ name: "tools" }).split("\n");

    expect(lines).toContain(`  url "${PLACEHOLDER_URL}"`);
    expect(lines).toContain(`  homepage "${PLACEHOLDER_HOMEPAGE}"`);
  });

  it("does not HTML-escape values", () => {
    const content = renderStubFormula({ name: "tools", url: "https://example.com/a.tar.gz?x=1&y=2" });

    expect(content).toContain('  url "https://example.com/a.tar.gz?x=1&y=2"');
  });
});
