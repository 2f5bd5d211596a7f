import fs from "fs";
import type { Sample } from "@core-types";

export interface ParseResult {
  samples: Sample[];
  skipped: number;       // non-comment lines that did not yield an (x, y) pair
  warnings: string[];
  error: string | null;
}

const DELIMITERS = /[\s,;]+/;

function parseRow(line: string): Sample | null {
  const tokens = line.split(DELIMITERS).filter((t) => t !== "");
  if (tokens.length < 2) return null;
  const x = Number(tokens[0]);
  const y = Number(tokens[1]);
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  return { x, y };
}

/**
 * Parse thermodynamic integration rows: `λ dG/dλ` per line, separated by any
 * mix of whitespace, commas and semicolons. Lines starting with `#` are
 * comments; extra columns are ignored.
 */
export const parseSamples = (content: string): ParseResult => {
  const warnings: string[] = [];
  const samples: Sample[] = [];
  let skipped = 0;

  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const row = parseRow(line);
    if (row === null) {
      skipped++;
      continue;
    }
    samples.push(row);
  }

  if (skipped > 0) {
    warnings.push(`Skipped ${skipped} invalid or incomplete lines`);
  }

  if (samples.length === 0) {
    return { samples, skipped, warnings, error: "No valid samples found" };
  }

  return { samples, skipped, warnings, error: null };
};

export function readSampleFile(file: string): ParseResult {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return {
      samples: [],
      skipped: 0,
      warnings: [reason],
      error: `failed to open the file ${file}`,
    };
  }
  return parseSamples(content);
}
