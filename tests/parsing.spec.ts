import { describe, expect, it } from "vitest";

import { isDiceFaces, parseAmount, parseChoice, parseDiceFaces } from "../src/domain/parsing/input.js";

describe("parseAmount", () => {
  it("reads plain, grouped and suffixed amounts", () => {
    expect(parseAmount("12000")).toBe(12000);
    expect(parseAmount("12k")).toBe(12000);
    expect(parseAmount("12 K")).toBe(12000);
    expect(parseAmount("1.5m")).toBe(1500000);
    expect(parseAmount("$1,234.50")).toBe(1234.5);
  });

  it("strips the uc currency marker only as a standalone token", () => {
    expect(parseAmount("100 uc")).toBe(100);
    expect(parseAmount("uc250")).toBe(250);
    expect(parseAmount("success")).toBeNull();
  });

  it("falls back to the first number embedded in free text", () => {
    expect(parseAmount("about 250 gold")).toBe(250);
    expect(parseAmount("roughly 3,500 this month")).toBe(3500);
  });

  it("returns null when nothing numeric can be read", () => {
    expect(parseAmount("")).toBeNull();
    expect(parseAmount("   ")).toBeNull();
    expect(parseAmount("lots")).toBeNull();
    expect(parseAmount("1.2.3")).toBeNull();
  });
});

describe("parseChoice", () => {
  it("matches the primary option phrases exactly", () => {
    expect(parseChoice("A")).toBe("PRIMARY_A");
    expect(parseChoice("  Company Services ")).toBe("PRIMARY_A");
    expect(parseChoice("b)")).toBe("PRIMARY_B");
    expect(parseChoice("Loan")).toBe("PRIMARY_B");
  });

  it("recognizes the finish words", () => {
    expect(parseChoice("finish")).toBe("FINISH");
    expect(parseChoice("Calculate")).toBe("FINISH");
    expect(parseChoice("done")).toBe("FINISH");
  });

  it("detects tax and transfer intent by keyword", () => {
    expect(parseChoice("tax please")).toBe("TAX");
    expect(parseChoice("move funds")).toBe("TRANSFER");
    expect(parseChoice("a transfer")).toBe("TRANSFER");
  });

  it("returns NONE for anything else", () => {
    expect(parseChoice("hello there")).toBe("NONE");
    expect(parseChoice("")).toBe("NONE");
  });
});

describe("parseDiceFaces", () => {
  it("reads dice notation", () => {
    expect(parseDiceFaces("d20")).toBe(20);
    expect(parseDiceFaces("D 12")).toBe(12);
    expect(parseDiceFaces("d100")).toBe(100);
  });

  it("accepts a bare allowed number", () => {
    expect(parseDiceFaces("roll a 25")).toBe(25);
  });

  it("rejects dice outside the allowed set", () => {
    expect(parseDiceFaces("d7")).toBeNull();
    expect(parseDiceFaces("d13")).toBeNull();
    expect(parseDiceFaces("six")).toBeNull();
  });

  it("narrows numbers to the allowed faces", () => {
    expect(isDiceFaces(50)).toBe(true);
    expect(isDiceFaces(6)).toBe(false);
  });
});
