import { promises as fs } from "node:fs";

import type { Term } from "../core/types.js";
import { createTerm } from "../core/term.js";
import { InvalidArgumentError } from "../core/errors.js";

export class DictionaryFormatError extends InvalidArgumentError {
  /** 1-based line number of the offending line. */
  readonly line: number;

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.line = line;
  }
}

const COUNT_LINE = /^\s*(\d+)\s*$/;
const ENTRY_LINE = /^\s*(\S+)\t(.+)$/;

/**
 * Parses the weighted word list text format:
 *
 *   3
 *       120.5	hello
 *       80	help
 *       2	helm
 *
 * An optional first line holding only the entry count, then one `weight<TAB>word` per
 * line. Words may contain spaces. Blank lines are skipped. Weight and uniqueness rules
 * are left to term validation at construction.
 */
export function parseDictionary(text: string): Term[] {
  const lines = text.split(/\r?\n/);
  const terms: Term[] = [];
  let declared: number | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!;
    if (!line.trim()) continue;

    if (declared === undefined && terms.length === 0) {
      const count = COUNT_LINE.exec(line);
      if (count) {
        declared = Number(count[1]);
        continue;
      }
    }

    const m = ENTRY_LINE.exec(line);
    if (!m) throw new DictionaryFormatError(i + 1, "expected <weight>\\t<word>");
    const weight = Number(m[1]);
    if (!Number.isFinite(weight)) throw new DictionaryFormatError(i + 1, `invalid weight "${m[1]}"`);
    terms.push(createTerm(m[2]!, weight));
  }

  if (declared !== undefined && declared !== terms.length) {
    throw new DictionaryFormatError(1, `declared ${declared} entries, found ${terms.length}`);
  }
  return terms;
}

export async function readDictionaryFile(path: string): Promise<Term[]> {
  return parseDictionary(await fs.readFile(path, "utf8"));
}
