import {
  ApiError,
  AuthenticationError,
  ConfigFileError,
  EmptyResponseError,
  InvalidOptionError,
  MissingConfigurationError,
  NetworkError,
  StockAnalyzerError,
  UnexpectedError,
} from "./errors.js";

export type Diagnostic = {
  title: string;
  details: string[];
  remedies: string[];
};

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function describeFailure(e: StockAnalyzerError): Diagnostic {
  if (e instanceof MissingConfigurationError) {
    return {
      title: "MISSING CONFIGURATION",
      details: [`${e.key} environment variable is not set!`],
      remedies: [`Add ${e.key} to your .env file or export it in your shell.`],
    };
  }
  if (e instanceof AuthenticationError) {
    return {
      title: "AUTHENTICATION ERROR",
      details: ["The API key is invalid or expired!", `Details: ${e.message}`],
      remedies: [
        "Check that OPENAI_API_KEY is correct",
        "Generate a new API key at: https://platform.openai.com/api-keys",
        "Verify that your OpenAI account is still active",
      ],
    };
  }
  if (e instanceof ApiError) {
    return {
      title: "API ERROR",
      details: [`Status Code: ${e.status ?? "Unknown"}`, `Details: ${e.message}`],
      remedies: [
        "Quota exceeded (no credits remaining)",
        "Rate limit reached; wait and run again",
        "Temporary issues at OpenAI: https://status.openai.com/",
        "Invalid request format or MCP server settings",
      ],
    };
  }
  if (e instanceof NetworkError) {
    return {
      title: "NETWORK ERROR",
      details: ["Could not reach the OpenAI API.", `Details: ${e.message}`],
      remedies: ["Check your network connection and proxy settings", "Try again once the connection is back"],
    };
  }
  if (e instanceof EmptyResponseError) {
    return {
      title: "EMPTY RESPONSE",
      details: [e.message],
      remedies: [
        "Check that SERVER_URL points at a reachable MCP server",
        "Check that AUTHORIZATION is accepted by the data provider",
      ],
    };
  }
  if (e instanceof ConfigFileError || e instanceof InvalidOptionError) {
    return {
      title: "INVALID INPUT",
      details: [e.message],
      remedies: ["Run with --help to see the accepted options"],
    };
  }
  const type = e instanceof UnexpectedError ? e.causeType : e.name;
  return {
    title: "UNEXPECTED ERROR",
    details: [`Type: ${type}`, `Details: ${e.message}`],
    remedies: ["Re-run the command; if it keeps failing, report this message."],
  };
}

export function formatDiagnostic(d: Diagnostic): string {
  const lines = [`ERROR: ${d.title}`, ...d.details.map((l) => `   ${l}`)];
  if (d.remedies.length) {
    lines.push("", "   Suggestions:", ...d.remedies.map((r) => `   - ${r}`));
  }
  return lines.join("\n");
}

export function exitCodeFor(e: StockAnalyzerError): number {
  return e instanceof ConfigFileError || e instanceof InvalidOptionError ? EXIT_USAGE : EXIT_FAILURE;
}
