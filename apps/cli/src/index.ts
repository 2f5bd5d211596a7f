/**
 * ti-lagrange: free-energy difference from thermodynamic integration data
 *
 * Usage:
 *   npx tsx apps/cli/src/index.ts input_file [plot_file [data_points]] [--json]
 */

import { hideBin } from "yargs/helpers";
import { run } from "./run";

run(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
