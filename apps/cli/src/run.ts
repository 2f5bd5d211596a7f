import yargs from "yargs";
import { CapacityExceededError, DegenerateSampleError } from "@lagrange-core/errors";
import { Lagrange } from "@lagrange-core/lagrange";
import { formatFreeEnergy, formatPolynomial } from "@lagrange-core/report";
import { buildFitArtifact } from "@ti-io/artifact";
import { writeEstimates } from "@ti-io/plot";
import { readSampleFile } from "@ti-io/samples";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config";
import type { AppConfig } from "./config";

const USAGE = [
  "ti-lagrange input_file [plot_file [data_points]]",
  " input_file: file contains thermodynamic integration data",
  "  plot_file: file for the plot data [optional]",
  "data_points: number of data points for plot [optional]",
];

function parseSteps(raw: string | undefined, sampleCount: number): number | null {
  if (raw === undefined) return Math.max(1, sampleCount - 1);
  const steps = Number(raw);
  return Number.isInteger(steps) && steps >= 1 ? steps : null;
}

/**
 * Fit, report and optionally plot one thermodynamic integration data file.
 * Resolves to the process exit code.
 */
export async function run(args: string[]): Promise<number> {
  const argv = await yargs(args)
    .scriptName("ti-lagrange")
    .usage(USAGE[0])
    .parserConfiguration({ "parse-positional-numbers": false })
    .option("config", { type: "string", default: DEFAULT_CONFIG_PATH, desc: "YAML configuration" })
    .option("json", { type: "boolean", default: false, desc: "print the fit artifact as JSON" })
    .exitProcess(false)
    .help(false)
    .parse();

  const [inputFile, plotFile, dataPoints] = argv._.map(String);

  if (inputFile === undefined) {
    USAGE.forEach((line) => console.log(line));
    return 0;
  }

  let cfg: AppConfig;
  try {
    cfg = loadConfig(argv.config);
  } catch (err) {
    console.error(`[config] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const parsed = readSampleFile(inputFile);
  parsed.warnings.forEach((w) => console.warn(`[samples] ${w}`));
  if (parsed.error !== null) {
    console.error(`[samples] ${parsed.error}`);
    return 1;
  }

  const steps = parseSteps(dataPoints, parsed.samples.length);
  if (steps === null) {
    console.error(`[plot] data_points must be a positive integer, got ${dataPoints}`);
    return 1;
  }

  let fit: Lagrange;
  try {
    fit = new Lagrange(parsed.samples, { maxPoints: cfg.fit.maxPoints });
  } catch (err) {
    if (err instanceof DegenerateSampleError || err instanceof CapacityExceededError) {
      console.error(`[fit] ${err.message}`);
      return 1;
    }
    throw err;
  }

  formatPolynomial(fit.getPolynomial(), cfg.report.coefficientDigits)
    .forEach((line) => console.log(line));
  formatFreeEnergy(fit.freeEnergy(), cfg.report.integralDigits)
    .forEach((line) => console.log(line));

  if (plotFile !== undefined) {
    const res = writeEstimates(plotFile, fit.estimates(steps), cfg.plot);
    if (res.ok) {
      console.log(`[plot] wrote ${res.rows} rows to ${plotFile}`);
    } else {
      // the report above stands; only the plot is lost
      console.error(`[plot] ${res.error}`);
    }
  }

  if (argv.json) {
    console.log(JSON.stringify(buildFitArtifact(fit), null, 2));
  }

  return 0;
}
