import type { Term } from "../../types.js";
import { createTerm } from "../../term.js";

/** Small seeded PRNG so randomized cases are the same on every run. */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rand: () => number, maxInclusive: number): number {
  return Math.floor(rand() * (maxInclusive + 1));
}

export function randomWord(rand: () => number, alphabet: string, maxLen: number): string {
  const len = 1 + randomInt(rand, maxLen - 1);
  let w = "";
  for (let i = 0; i < len; i++) w += alphabet.charAt(randomInt(rand, alphabet.length - 1));
  return w;
}

/** Distinct words over a tiny alphabet with small integer weights, so prefixes and ties are common. */
export function randomDictionary(rand: () => number, size: number, alphabet = "abc", maxLen = 5, maxWeight = 12): Term[] {
  const seen = new Set<string>();
  const terms: Term[] = [];
  for (let attempt = 0; attempt < size * 20 && terms.length < size; attempt++) {
    const w = randomWord(rand, alphabet, maxLen);
    if (seen.has(w)) continue;
    seen.add(w);
    terms.push(createTerm(w, randomInt(rand, maxWeight)));
  }
  return terms;
}

/** air:3, bat:2, bell:4, boy:1 */
export const SAMPLE: Term[] = [
  createTerm("air", 3),
  createTerm("bat", 2),
  createTerm("bell", 4),
  createTerm("boy", 1),
];
