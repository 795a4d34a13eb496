import type { PortSpec } from "../types/vm.js";

const DIGITS = /^\d+$/;

/**
 * Normalizes a port specification to an ordered list of integers.
 *
 * Accepts nothing, a single integer, a digit string, a comma-separated string, or a
 * list of integers and digit strings. Tokens that are not plain digits are dropped.
 */
export function parsePorts(spec: PortSpec): number[] {
  if (spec === null || spec === undefined) return [];

  if (typeof spec === "number") {
    return Number.isInteger(spec) ? [spec] : [];
  }

  if (typeof spec === "string") {
    return spec
      .split(",")
      .map((token) => token.trim())
      .filter((token) => DIGITS.test(token))
      .map((token) => Number.parseInt(token, 10));
  }

  const ports: number[] = [];
  for (const item of spec) {
    if (typeof item === "number") {
      if (Number.isInteger(item)) ports.push(item);
    } else if (DIGITS.test(item)) {
      ports.push(Number.parseInt(item, 10));
    }
  }
  return ports;
}

export function portKey(destPort: number): string {
  return `${destPort}/tcp`;
}
