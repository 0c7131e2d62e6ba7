import OpenAI, {
  APIConnectionError,
  APIError,
  AuthenticationError as OpenAIAuthenticationError,
  type ClientOptions,
} from "openai";
import type {
  Response as OpenAIResponse,
  ResponseCreateParamsNonStreaming,
} from "openai/resources/responses/responses";
import { MCP_SERVER_DESCRIPTION, MCP_SERVER_LABEL } from "./config.js";
import {
  ApiError,
  AuthenticationError,
  NetworkError,
  StockAnalyzerError,
  UnexpectedError,
} from "./errors.js";
import type { AnalysisRequest, AnalysisResponse, ContentItem, Credentials, ToolCallTrace } from "./types.js";

export type ClientOverrides = Pick<ClientOptions, "fetch" | "maxRetries" | "baseURL">;

export function createOpenAIClient(credentials: Credentials, overrides: ClientOverrides = {}): OpenAI {
  return new OpenAI({ apiKey: credentials.apiKey, ...overrides });
}

export function createAnalysisRequest(
  credentials: Credentials,
  prompt: string,
  overrides: { model: string; serverLabel?: string },
): AnalysisRequest {
  return {
    model: overrides.model,
    prompt,
    tool: {
      type: "mcp",
      serverLabel: overrides.serverLabel ?? MCP_SERVER_LABEL,
      serverDescription: MCP_SERVER_DESCRIPTION,
      serverUrl: credentials.serverUrl,
      authorization: credentials.authorization,
      requireApproval: "never",
    },
  };
}

export function toCreateParams(request: AnalysisRequest): ResponseCreateParamsNonStreaming {
  const { tool } = request;
  return {
    model: request.model,
    input: request.prompt,
    // without this the API leaves code_interpreter_call.outputs null
    include: ["code_interpreter_call.outputs"],
    tools: [
      {
        type: "mcp",
        server_label: tool.serverLabel,
        server_description: tool.serverDescription,
        server_url: tool.serverUrl,
        authorization: tool.authorization,
        require_approval: tool.requireApproval,
      },
      {
        type: "code_interpreter",
        container: { type: "auto" },
      },
    ],
  };
}

/** Maps SDK and transport failures onto the analyzer's error categories. */
export function classifyError(e: unknown): StockAnalyzerError {
  if (e instanceof StockAnalyzerError) return e;
  if (e instanceof OpenAIAuthenticationError) {
    return new AuthenticationError(e.message, e);
  }
  // APIConnectionError (and its timeout subclass) extends APIError, so it has to be checked first.
  if (e instanceof APIConnectionError) {
    return new NetworkError(e.message, e);
  }
  if (e instanceof APIError && e.status !== undefined) {
    return new ApiError(e.message, e.status, e);
  }
  return new UnexpectedError(e);
}

const DATA_URL_RE = /^data:image\/[a-z0-9.+-]+;base64,(.+)$/i;
const IMAGE_EXT_RE = /\.(png|jpe?g|gif|webp)$/i;

function isImageFilename(filename: string): boolean {
  // citations without an extension are kept; anything else must look like an image
  return !/\.[^./\\]+$/.test(filename) || IMAGE_EXT_RE.test(filename);
}

export function collectToolCalls(response: OpenAIResponse): ToolCallTrace[] {
  const calls: ToolCallTrace[] = [];
  for (const output of response.output) {
    if (output.type === "mcp_list_tools") {
      calls.push({
        kind: "list_tools",
        serverLabel: output.server_label,
        tools: output.tools.map((t) => t.name),
        ...(output.error ? { error: output.error } : {}),
      });
    } else if (output.type === "mcp_call") {
      calls.push({
        kind: "call",
        serverLabel: output.server_label,
        name: output.name,
        arguments: output.arguments,
        ...(output.error ? { error: output.error } : {}),
      });
    }
  }
  return calls;
}

export async function collectContentItems(client: OpenAI, response: OpenAIResponse): Promise<ContentItem[]> {
  const items: ContentItem[] = [];
  const downloaded = new Set<string>();

  for (const output of response.output) {
    if (output.type === "code_interpreter_call") {
      for (const out of output.outputs ?? []) {
        if (out.type !== "image") continue;
        const m = DATA_URL_RE.exec(out.url.replace(/\s+/g, ""));
        if (!m) continue;
        items.push({ kind: "image", data: Buffer.from(m[1], "base64"), source: `code_interpreter:${output.id}` });
      }
      continue;
    }

    if (output.type !== "message") continue;

    for (const part of output.content) {
      if (part.type !== "output_text") continue;
      items.push({ kind: "text", text: part.text });

      for (const ann of part.annotations) {
        if (ann.type !== "container_file_citation") continue;
        if (!isImageFilename(ann.filename)) continue;
        const key = `${ann.container_id}/${ann.file_id}`;
        if (downloaded.has(key)) continue;
        downloaded.add(key);

        const file = await client.containers.files.content.retrieve(ann.file_id, {
          container_id: ann.container_id,
        });
        const data = Buffer.from(await file.arrayBuffer());
        items.push({ kind: "image", data, source: `container:${key}` });
      }
    }
  }

  return items;
}

/**
 * One Responses API call. Tool discovery and every MCP tool call happen on the provider's side;
 * this only sees the final output, plus the chart files it cites.
 */
export async function dispatchAnalysis(client: OpenAI, request: AnalysisRequest): Promise<AnalysisResponse> {
  try {
    const resp = await client.responses.create(toCreateParams(request));
    const items = await collectContentItems(client, resp);
    return { id: resp.id, items, toolCalls: collectToolCalls(resp), raw: resp };
  } catch (e) {
    throw classifyError(e);
  }
}
