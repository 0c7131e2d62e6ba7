import type { Credentials } from "../../types.js";

export const TEST_ENV = {
  OPENAI_API_KEY: "test-openai-key-000",
  AUTHORIZATION: "test-authorization",
  SERVER_URL: "https://mcp.example.test/mcp",
};

export const TEST_CREDENTIALS: Credentials = {
  apiKey: TEST_ENV.OPENAI_API_KEY,
  authorization: TEST_ENV.AUTHORIZATION,
  serverUrl: TEST_ENV.SERVER_URL,
};

export const CHART_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x01, 0x02]);

export function responsePayload(output: unknown[]) {
  return {
    id: "resp_test_1",
    object: "response",
    created_at: 1700000000,
    model: "gpt-5-mini",
    status: "completed",
    output,
    parallel_tool_calls: true,
    tool_choice: "auto",
    tools: [],
  };
}

export function messageOutput(text: string, annotations: unknown[] = []) {
  return {
    type: "message",
    id: "msg_test_1",
    role: "assistant",
    status: "completed",
    content: [{ type: "output_text", text, annotations }],
  };
}

export function containerCitation(containerId: string, fileId: string) {
  return {
    type: "container_file_citation",
    container_id: containerId,
    file_id: fileId,
    filename: "chart.png",
    start_index: 0,
    end_index: 0,
  };
}
