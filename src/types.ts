export type AnalysisInterval = "daily" | "weekly" | "monthly";

export interface Credentials {
  /** OpenAI API key used for the Responses API call. */
  readonly apiKey: string;
  /** URL of the remote MCP server the model should discover tools on. */
  readonly serverUrl: string;
  /** Credential forwarded to the MCP server (the data provider's API key). */
  readonly authorization: string;
}

export interface AnalysisOptions {
  symbol: string;
  months: number;
  interval: AnalysisInterval;
}

export interface McpToolDescriptor {
  type: "mcp";
  serverLabel: string;
  serverDescription: string;
  serverUrl: string;
  authorization: string;
  requireApproval: "never";
}

export interface AnalysisRequest {
  model: string;
  prompt: string;
  tool: McpToolDescriptor;
}

export type ContentItem =
  | { kind: "text"; text: string }
  | {
      kind: "image";
      data: Buffer;
      /** where the bytes came from, e.g. "container:cntr_1/file_1" */
      source: string;
    };

/** MCP activity the provider ran on our behalf, as reported back in the response. */
export type ToolCallTrace =
  | { kind: "list_tools"; serverLabel: string; tools: string[]; error?: string }
  | { kind: "call"; serverLabel: string; name: string; arguments: string; error?: string };

export interface AnalysisResponse {
  id?: string;
  items: ContentItem[];
  toolCalls?: ToolCallTrace[];
  /** provider payload, kept for the optional response dump */
  raw?: unknown;
}

export interface AnalysisSummary {
  reportText: string;
  artifactPaths: string[];
}
