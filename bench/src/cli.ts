/* Load generator CLI: drives POST /ask at a fixed rate and reports latency percentiles */
import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import {
  DEFAULT_DURATION_SECONDS,
  DEFAULT_HOST,
  DEFAULT_QUERIES_FILE,
  DEFAULT_REPEAT_RATIO,
  DEFAULT_RPS,
  DEFAULT_WARMUP_SECONDS,
  REQUEST_TIMEOUT_MS,
} from "./config/constants";
import { sendAsk } from "./client";
import { runBench } from "./loadgen";
import { loadQueries } from "./queries";
import { formatReport } from "./report";
import { summarize } from "./stats";

export interface CliOptions {
  host: string;
  rps: number;
  durationSeconds: number;
  warmupSeconds: number;
  queriesFile: string;
  repeatRatio: number;
  out: string | null;
  help: boolean;
}

export const USAGE = `Usage: qa-cache-loadgen [options]

  --host <url>           service base URL (default ${DEFAULT_HOST})
  --rps <n>              target requests per second (default ${DEFAULT_RPS})
  --duration <seconds>   measured run length (default ${DEFAULT_DURATION_SECONDS})
  --warmup <seconds>     unmeasured warmup length (default ${DEFAULT_WARMUP_SECONDS})
  --queries-file <path>  one query per line (default ${DEFAULT_QUERIES_FILE})
  --repeat-ratio <0..1>  share of queries drawn from the popular subset (default ${DEFAULT_REPEAT_RATIO})
  --out <path>           also write the report as JSON
  -h, --help             show this help`;

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

function numberFlag(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new CliError(`--${name} must be a number, got: ${raw}`);
  }
  return value;
}

const FLAGS = {
  host: { type: "string" },
  rps: { type: "string" },
  duration: { type: "string" },
  warmup: { type: "string" },
  "queries-file": { type: "string" },
  "repeat-ratio": { type: "string" },
  out: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: FLAGS, strict: true, allowPositionals: false }).values;
  } catch (error) {
    // parseArgs reports unknown or malformed flags as TypeError
    throw new CliError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const opts: CliOptions = {
    host: values.host ?? DEFAULT_HOST,
    rps: numberFlag("rps", values.rps, DEFAULT_RPS),
    durationSeconds: numberFlag("duration", values.duration, DEFAULT_DURATION_SECONDS),
    warmupSeconds: numberFlag("warmup", values.warmup, DEFAULT_WARMUP_SECONDS),
    queriesFile: values["queries-file"] ?? DEFAULT_QUERIES_FILE,
    repeatRatio: numberFlag("repeat-ratio", values["repeat-ratio"], DEFAULT_REPEAT_RATIO),
    out: values.out ?? null,
    help: values.help ?? false,
  };

  // BENCH_* defaults bypass numberFlag, so NaN and Infinity can still arrive here
  if (!Number.isFinite(opts.rps) || opts.rps <= 0) {
    throw new CliError(`--rps must be a positive number, got: ${opts.rps}`);
  }
  if (!Number.isFinite(opts.durationSeconds) || opts.durationSeconds < 0) {
    throw new CliError(`--duration must be a non-negative number, got: ${opts.durationSeconds}`);
  }
  if (!Number.isFinite(opts.warmupSeconds) || opts.warmupSeconds < 0) {
    throw new CliError(`--warmup must be a non-negative number, got: ${opts.warmupSeconds}`);
  }
  if (!(opts.repeatRatio >= 0 && opts.repeatRatio <= 1)) {
    throw new CliError(`--repeat-ratio must be within [0, 1], got: ${opts.repeatRatio}`);
  }
  return opts;
}

export async function main(argv: string[]): Promise<number> {
  let opts: CliOptions;
  let queries: string[];
  try {
    opts = parseCliArgs(argv);
    if (opts.help) {
      console.log(USAGE);
      return 0;
    }
    queries = await loadQueries(opts.queriesFile);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  console.log(
    `Target: ${opts.host}  rps=${opts.rps}  duration=${opts.durationSeconds}s  warmup=${opts.warmupSeconds}s  ` +
      `repeat-ratio=${opts.repeatRatio}  queries=${queries.length}`
  );

  const samples = await runBench(
    {
      rps: opts.rps,
      durationSeconds: opts.durationSeconds,
      warmupSeconds: opts.warmupSeconds,
      queries,
      repeatRatio: opts.repeatRatio,
    },
    {
      send: (query) => sendAsk(opts.host, query, { timeoutMs: REQUEST_TIMEOUT_MS }),
      onPhase: (phase, seconds) =>
        console.log(phase === "warmup" ? `🔥 Warming up for ${seconds}s...` : `📏 Measuring for ${seconds}s...`),
    }
  );

  const report = summarize(samples);
  console.log(formatReport(report));

  if (opts.out) {
    await writeFile(
      opts.out,
      JSON.stringify({ date: new Date().toISOString(), options: opts, report }, null, 2)
    );
    console.log(`\n💾 Report saved to: ${opts.out}`);
  }
  return 0;
}

// Run if executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  main(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
