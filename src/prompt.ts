import { MCP_SERVER_LABEL } from "./config.js";
import { InvalidOptionError } from "./errors.js";
import type { AnalysisInterval, AnalysisOptions } from "./types.js";

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = {
  symbol: "AAPL",
  months: 3,
  interval: "monthly",
};

const INTERVALS: readonly AnalysisInterval[] = ["daily", "weekly", "monthly"];

const PERIOD_NOUN: Record<AnalysisInterval, string> = {
  daily: "day",
  weekly: "week",
  monthly: "month",
};

export function isAnalysisInterval(v: string): v is AnalysisInterval {
  return INTERVALS.some((i) => i === v);
}

export function normalizeAnalysisOptions(overrides: Partial<AnalysisOptions> = {}): AnalysisOptions {
  const symbol = (overrides.symbol ?? DEFAULT_ANALYSIS_OPTIONS.symbol).trim().toUpperCase();
  if (!symbol) throw new InvalidOptionError("Ticker symbol must not be empty");

  const months = overrides.months ?? DEFAULT_ANALYSIS_OPTIONS.months;
  if (!Number.isInteger(months) || months <= 0) {
    throw new InvalidOptionError(`Time window must be a positive whole number of months (got ${months})`);
  }

  return { symbol, months, interval: overrides.interval ?? DEFAULT_ANALYSIS_OPTIONS.interval };
}

export type PromptOptions = Partial<AnalysisOptions> & {
  /** label of the MCP server the model should pull prices from */
  source?: string;
};

/**
 * Instruction sent to the model. Deterministic: the same options always give the same string.
 */
export function buildAnalysisPrompt(overrides: PromptOptions = {}): string {
  const { symbol, months, interval } = normalizeAnalysisOptions(overrides);
  const source = overrides.source?.trim() || MCP_SERVER_LABEL;
  const period = PERIOD_NOUN[interval];
  const window = months === 1 ? "the last month" : `the last ${months} months`;
  const avoid = interval === "daily" ? "" : ` and not the daily prices`;

  return `Please analyze the ${symbol} stock for ${window} using ${interval} data as the time window${avoid}.
Use ${source} as the data source for stock prices and the code_interpreter tool for analysis.

### Analysis
- Calculate ${period}-over-${period} price changes (%)
- Identify trend direction (up/down/sideways)
- Compute key metrics: avg closing price, volatility, volume trends

### Visualization
Generate using \`code_interpreter\`:
- **Price chart**: ${capitalize(interval)} OHLC data
- **Volume chart**: Trading volume per ${period}

Ensure charts have clear titles, labels, and legends.`;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
