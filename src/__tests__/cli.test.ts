import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { Dispatch } from "../analyzer.js";
import { runCli } from "../cli.js";
import { AuthenticationError } from "../errors.js";
import { CHART_BYTES, TEST_ENV } from "./helpers/fixtures.js";
import { captureLogger } from "./helpers/logger.js";

let dir: string;
let outputPath: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "stock-analyzer-cli-"));
  outputPath = path.join(dir, "stock_image.png");
});

afterEach(async () => {
  await fs.remove(dir);
});

const fixedDispatch = (): Mock<Dispatch> =>
  vi.fn<Dispatch>(async () => ({
    items: [
      { kind: "text", text: "AAPL rose 2%" },
      { kind: "image", data: CHART_BYTES, source: "stub" },
    ],
  }));

describe("runCli", () => {
  it("prints the report, saves the chart and exits 0", async () => {
    const { logger, out, err } = captureLogger();
    const dispatch = fixedDispatch();

    const code = await runCli(["--output", outputPath], { env: { ...TEST_ENV }, logger, dispatch });

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toContain("AAPL rose 2%");
    expect(await fs.readFile(outputPath)).toEqual(CHART_BYTES);
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  it("exits non-zero naming AUTHORIZATION when it is unset, without a network call", async () => {
    const { logger, err } = captureLogger();
    const dispatch = fixedDispatch();
    const { AUTHORIZATION: _unused, ...env } = TEST_ENV;

    const code = await runCli(["--output", outputPath], { env, logger, dispatch });

    expect(code).toBe(1);
    expect(dispatch).not.toHaveBeenCalled();
    expect(err).toHaveLength(1);
    expect(err[0].split("\n").slice(0, 2)).toEqual([
      "ERROR: MISSING CONFIGURATION",
      "   AUTHORIZATION environment variable is not set!",
    ]);
    expect(await fs.pathExists(outputPath)).toBe(false);
  });

  it("reports authentication failures from the service", async () => {
    const { logger, err } = captureLogger();
    const dispatch = vi.fn<Dispatch>(async () => {
      throw new AuthenticationError("401 Incorrect API key provided");
    });

    const code = await runCli(["--output", outputPath], { env: TEST_ENV, logger, dispatch });

    expect(code).toBe(1);
    expect(err[0].split("\n").slice(0, 3)).toEqual([
      "ERROR: AUTHENTICATION ERROR",
      "   The API key is invalid or expired!",
      "   Details: 401 Incorrect API key provided",
    ]);
  });

  it("exits 1 with EMPTY RESPONSE and writes no chart when nothing comes back", async () => {
    const { logger, err } = captureLogger();
    const code = await runCli(["--output", outputPath], {
      env: TEST_ENV,
      logger,
      dispatch: async () => ({ items: [] }),
    });

    expect(code).toBe(1);
    expect(err[0].split("\n")[0]).toBe("ERROR: EMPTY RESPONSE");
    expect(await fs.pathExists(outputPath)).toBe(false);
  });

  it("rejects an invalid --months with exit code 2", async () => {
    const { logger, err } = captureLogger();
    const dispatch = fixedDispatch();

    const code = await runCli(["--months", "abc"], { env: TEST_ENV, logger, dispatch });

    expect(code).toBe(2);
    expect(dispatch).not.toHaveBeenCalled();
    expect(err[0].split("\n").slice(0, 2)).toEqual([
      "ERROR: INVALID INPUT",
      '   --months must be a positive whole number (got "abc")',
    ]);
  });

  it("exits 2 on an unknown flag", async () => {
    const { logger } = captureLogger();
    const dispatch = fixedDispatch();
    expect(await runCli(["--verbose"], { env: TEST_ENV, logger, dispatch })).toBe(2);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("reads run options from --config, with flags taking precedence", async () => {
    const configPath = path.join(dir, "run.json");
    await fs.outputJson(configPath, { symbol: "msft", months: 6, interval: "weekly", output: outputPath });
    const { logger } = captureLogger();
    const dispatch = fixedDispatch();

    const code = await runCli(["--config", configPath, "--months", "2"], { env: TEST_ENV, logger, dispatch });

    expect(code).toBe(0);
    const [request] = dispatch.mock.calls[0];
    expect(request.prompt.split("\n")[0]).toBe(
      "Please analyze the MSFT stock for the last 2 months using weekly data as the time window and not the daily prices.",
    );
    expect(await fs.readFile(outputPath)).toEqual(CHART_BYTES);
  });
});
