import { randomBytes } from "node:crypto";
import { readFileSync } from "node:fs";

interface WordLists {
  adjectives: string[];
  nouns: string[];
}

let cached: WordLists | null = null;

function loadWords(): WordLists {
  if (!cached) {
    const text = readFileSync(new URL("./words.json", import.meta.url), "utf-8");
    const parsed: unknown = JSON.parse(text);
    if (
      typeof parsed !== "object" ||
      parsed === null ||
      !("adjectives" in parsed) ||
      !("nouns" in parsed) ||
      !isStringArray(parsed.adjectives) ||
      !isStringArray(parsed.nouns)
    ) {
      throw new Error("words.json must contain adjectives and nouns string arrays");
    }
    cached = { adjectives: parsed.adjectives, nouns: parsed.nouns };
  }
  return cached;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === "string");
}

function pickRandom<T>(arr: T[]): T {
  return arr[Math.floor(Math.random() * arr.length)];
}

/** 12 hex characters; short enough that `tap<id>` fits the 15-char interface name limit. */
export function generateId(): string {
  return randomBytes(6).toString("hex");
}

export function generateName(taken: ReadonlySet<string> = new Set()): string {
  const { adjectives, nouns } = loadWords();
  for (let i = 0; i < 100; i++) {
    const name = `${pickRandom(adjectives)}_${pickRandom(nouns)}`;
    if (!taken.has(name)) return name;
  }
  return `${pickRandom(adjectives)}_${pickRandom(nouns)}_${Date.now().toString().slice(-4)}`;
}
