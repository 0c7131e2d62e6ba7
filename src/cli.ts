import { Command, CommanderError } from "commander";
import { runAnalysis, type Dispatch } from "./analyzer.js";
import { classifyError } from "./dispatcher.js";
import { describeFailure, EXIT_USAGE, exitCodeFor, formatDiagnostic } from "./diagnostics.js";
import { InvalidOptionError } from "./errors.js";
import { isAnalysisInterval, normalizeAnalysisOptions } from "./prompt.js";
import { createConsoleLogger, type RunLogger } from "./util/logger.js";
import { mergeRunConfig, readRunConfig, type CliRunOptions, type RunConfig } from "./util/runConfig.js";
import type { AnalysisInterval } from "./types.js";

export type CliDeps = {
  env?: Record<string, string | undefined>;
  logger?: RunLogger;
  dispatch?: Dispatch;
};

function optString(v: unknown): string | undefined {
  if (v === undefined || v === null) return undefined;
  const s = String(v).trim();
  return s || undefined;
}

function parseMonths(v: unknown): number | undefined {
  if (v === undefined) return undefined;
  if (typeof v === "number") return v;
  const s = String(v).trim();
  if (!/^\d+$/.test(s)) throw new InvalidOptionError(`--months must be a positive whole number (got "${s}")`);
  return Number.parseInt(s, 10);
}

function parseInterval(v: unknown): AnalysisInterval | undefined {
  const s = optString(v)?.toLowerCase();
  if (s === undefined) return undefined;
  if (!isAnalysisInterval(s)) throw new InvalidOptionError(`--interval must be one of daily|weekly|monthly (got "${s}")`);
  return s;
}

export function createProgram(deps: CliDeps = {}): Command {
  const log = deps.logger ?? createConsoleLogger();
  const program = new Command();

  program
    .name("stock-analyzer")
    .description("Ask an OpenAI model to analyse a stock through a remote Alpha Vantage MCP server.")
    .version("0.1.0")
    .option("--config <path>", "JSON config file containing run options")
    .option("--symbol <ticker>", "Ticker symbol to analyse (default AAPL)")
    .option("--months <n>", "Time window in months (default 3)")
    .option("--interval <name>", "Sampling interval: daily|weekly|monthly (default monthly)")
    .option("--model <name>", "OpenAI model (default OPENAI_MODEL or gpt-5-mini)")
    .option("--server-label <label>", "Label for the MCP server (default AlphaVantage)")
    .option("--output <path>", "Where to save the first chart (default stock_image.png)")
    .option("--dump-response <path>", "Also write the complete API response as JSON")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => log.plain(s.trimEnd()),
      writeErr: (s) => log.error(s.trimEnd()),
    })
    .action(async (opts: CliRunOptions & { config?: string }) => {
      const cfg: RunConfig = opts.config ? await readRunConfig(String(opts.config)) : {};
      const merged = mergeRunConfig(opts, cfg);

      const analysis = normalizeAnalysisOptions({
        symbol: optString(merged.symbol),
        months: parseMonths(merged.months),
        interval: parseInterval(merged.interval),
      });

      await runAnalysis({
        env: deps.env,
        analysis,
        model: optString(merged.model),
        serverLabel: optString(merged.serverLabel),
        outputPath: optString(merged.output),
        dumpResponsePath: optString(merged.dumpResponse),
        logger: log,
        dispatch: deps.dispatch,
      });
    });

  return program;
}

/** Runs the CLI and resolves to the process exit code; never calls process.exit itself. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.logger ?? createConsoleLogger();
  const program = createProgram({ ...deps, logger: log });

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // --help and --version also end up here, with exit code 0
      return e.exitCode === 0 ? 0 : EXIT_USAGE;
    }
    const err = classifyError(e);
    log.error(formatDiagnostic(describeFailure(err)));
    return exitCodeFor(err);
  }
}
