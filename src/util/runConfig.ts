import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";
import { ConfigFileError, errorMessage } from "../errors.js";

const RunConfigSchema = z
  .object({
    symbol: z.string().optional(),
    months: z.number().int().positive().optional(),
    interval: z.enum(["daily", "weekly", "monthly"]).optional(),
    model: z.string().optional(),
    output: z.string().optional(),
    serverLabel: z.string().optional(),
    dumpResponse: z.string().optional(),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;

function cleanString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

export async function readRunConfig(configPath: string): Promise<RunConfig> {
  const abs = path.resolve(configPath);
  const ok = await fs.pathExists(abs);
  if (!ok) throw new ConfigFileError(`Config file not found: ${configPath}`);

  let raw: unknown;
  try {
    raw = await fs.readJson(abs);
  } catch (e) {
    throw new ConfigFileError(`Config file is not valid JSON: ${configPath} (${errorMessage(e)})`);
  }

  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigFileError(`Invalid config JSON: ${msg}`);
  }

  // Normalize: convert blank strings to undefined.
  const cfg = parsed.data;
  return {
    symbol: cleanString(cfg.symbol),
    months: cfg.months,
    interval: cfg.interval,
    model: cleanString(cfg.model),
    output: cleanString(cfg.output),
    serverLabel: cleanString(cfg.serverLabel),
    dumpResponse: cleanString(cfg.dumpResponse),
  };
}

export type CliRunOptions = {
  symbol?: unknown;
  months?: unknown;
  interval?: unknown;
  model?: unknown;
  output?: unknown;
  serverLabel?: unknown;
  dumpResponse?: unknown;
};

/** CLI wins wherever a flag was explicitly given; `months` and `interval` are validated later. */
export function mergeRunConfig(cli: CliRunOptions, cfg: RunConfig): CliRunOptions {
  const merged: CliRunOptions = { ...cfg };

  const symbol = cleanString(cli.symbol);
  if (symbol) merged.symbol = symbol;

  if (cli.months !== undefined) merged.months = cli.months;

  const interval = cleanString(cli.interval);
  if (interval) merged.interval = interval;

  const model = cleanString(cli.model);
  if (model) merged.model = model;

  const output = cleanString(cli.output);
  if (output) merged.output = output;

  const serverLabel = cleanString(cli.serverLabel);
  if (serverLabel) merged.serverLabel = serverLabel;

  const dump = cleanString(cli.dumpResponse);
  if (dump) merged.dumpResponse = dump;

  return merged;
}
