import { describe, expect, it } from "vitest";
import { parsePorts, portKey } from "../ports.js";

describe("parsePorts", () => {
  it("treats absent specs as no ports", () => {
    expect(parsePorts(undefined)).toEqual([]);
    expect(parsePorts(null)).toEqual([]);
    expect(parsePorts("")).toEqual([]);
  });

  it("accepts a single integer or digit string", () => {
    expect(parsePorts(8080)).toEqual([8080]);
    expect(parsePorts("22")).toEqual([22]);
    expect(parsePorts(80.5)).toEqual([]);
  });

  it("splits comma-separated strings and drops non-digit tokens", () => {
    expect(parsePorts("8080, 8081,abc,,-1")).toEqual([8080, 8081]);
  });

  it("keeps list order and mixes integers with digit strings", () => {
    expect(parsePorts([443, "80", "x", 1.5, " 22 "])).toEqual([443, 80]);
  });
});

describe("portKey", () => {
  it("keys mappings by destination port", () => {
    expect(portKey(80)).toBe("80/tcp");
  });
});
