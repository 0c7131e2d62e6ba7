import { DEFAULT_OUTPUT_IMAGE_PATH, MCP_SERVER_LABEL, loadCredentials, maskSecret, resolveModel } from "./config.js";
import { classifyError, createAnalysisRequest, createOpenAIClient, dispatchAnalysis } from "./dispatcher.js";
import { buildAnalysisPrompt } from "./prompt.js";
import { handleAnalysisResponse } from "./result.js";
import { writeJson } from "./util/io.js";
import { banner, createConsoleLogger, type RunLogger } from "./util/logger.js";
import type {
  AnalysisOptions,
  AnalysisRequest,
  AnalysisResponse,
  AnalysisSummary,
  Credentials,
  ToolCallTrace,
} from "./types.js";

export type RunState = "Idle" | "ConfigLoaded" | "RequestSent" | "ResponseReceived" | "Completed" | "Failed";

export type Dispatch = (request: AnalysisRequest, credentials: Credentials) => Promise<AnalysisResponse>;

export const defaultDispatch: Dispatch = (request, credentials) =>
  dispatchAnalysis(createOpenAIClient(credentials), request);

export type RunAnalysisOptions = {
  env?: Record<string, string | undefined>;
  analysis?: Partial<AnalysisOptions>;
  model?: string;
  serverLabel?: string;
  /** Where the first chart is written; defaults to stock_image.png in the working directory. */
  outputPath?: string;
  /** If set, the raw provider response is written here as JSON. */
  dumpResponsePath?: string;
  logger?: RunLogger;
  dispatch?: Dispatch;
  onStateChange?: (state: RunState) => void;
};

export type RunAnalysisResult = AnalysisSummary & {
  responseId?: string;
};

export function formatToolCall(call: ToolCallTrace): string {
  const failed = call.error ? ` FAILED: ${call.error}` : "";
  if (call.kind === "list_tools") {
    return `McpListTools server_label=${call.serverLabel} tools=[${call.tools.join(", ")}]${failed}`;
  }
  return `McpCall server_label=${call.serverLabel} name=${call.name} arguments=${call.arguments}${failed}`;
}

export async function runAnalysis(opts: RunAnalysisOptions = {}): Promise<RunAnalysisResult> {
  const log = opts.logger ?? createConsoleLogger();
  const dispatch = opts.dispatch ?? defaultDispatch;
  const enter = (s: RunState) => opts.onStateChange?.(s);

  enter("Idle");
  try {
    const env = opts.env ?? process.env;
    const credentials = loadCredentials(env);
    log.info(`OpenAI API key found: ${maskSecret(credentials.apiKey)}`);
    log.info("MCP authorization found");
    log.info("MCP server URL found");
    enter("ConfigLoaded");

    const serverLabel = opts.serverLabel ?? MCP_SERVER_LABEL;
    const prompt = buildAnalysisPrompt({ ...opts.analysis, source: serverLabel });
    const request = createAnalysisRequest(credentials, prompt, {
      model: resolveModel(env, opts.model),
      serverLabel,
    });

    log.plain(`\n${banner("OPENAI RESPONSES API CALL")}`);
    log.plain(`Model: ${request.model}`);
    log.plain(`MCP Server: ${request.tool.serverLabel}`);
    log.plain(`MCP URL: ${request.tool.serverUrl}`);
    log.plain(`User Prompt:\n${prompt}`);
    log.plain("-".repeat(80));

    enter("RequestSent");
    const response = await dispatch(request, credentials);
    enter("ResponseReceived");

    if (opts.dumpResponsePath) {
      await writeJson(opts.dumpResponsePath, response.raw ?? response.items);
      log.info(`Saved complete response to: ${opts.dumpResponsePath}`);
    }

    const toolCalls = response.toolCalls ?? [];
    if (toolCalls.length) {
      log.plain(`\n${banner("MCP TOOL CALLS")}`);
      for (const line of toolCalls.map(formatToolCall)) log.plain(line);
    }

    const summary = await handleAnalysisResponse(response, {
      outputPath: opts.outputPath ?? DEFAULT_OUTPUT_IMAGE_PATH,
    });

    log.plain(`\n${banner("FINAL OUTPUT")}`);
    log.plain(summary.reportText || "(no text in response)");
    log.plain("=".repeat(80));

    if (summary.artifactPaths.length) {
      for (const p of summary.artifactPaths) log.info(`Saved visualization to: ${p}`);
    } else {
      log.warn("No visualizations were returned.");
    }

    enter("Completed");
    return { ...summary, responseId: response.id };
  } catch (e) {
    enter("Failed");
    throw classifyError(e);
  }
}
