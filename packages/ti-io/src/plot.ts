import fs from "fs";
import type { EstimatePoint } from "@core-types";
import { DEFAULT_PLOT_FORMAT, formatEstimate } from "@lagrange-core/report";
import type { PlotFormat } from "@lagrange-core/report";

export type WriteResult =
  | { ok: true; rows: number }
  | { ok: false; error: string };

/** Write (x, estimate) rows, replacing any existing file */
export function writeEstimates(
  file: string,
  points: Iterable<EstimatePoint>,
  format: PlotFormat = DEFAULT_PLOT_FORMAT
): WriteResult {
  const lines: string[] = [];
  for (const p of points) lines.push(formatEstimate(p, format));

  try {
    fs.writeFileSync(file, lines.map((l) => l + "\n").join(""), { flag: "w" });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `file ${file} cannot be opened: ${reason}` };
  }
  return { ok: true, rows: lines.length };
}
