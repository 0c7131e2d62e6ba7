import path from "node:path";
import { EmptyResponseError } from "./errors.js";
import { writeBinary } from "./util/io.js";
import type { AnalysisResponse, AnalysisSummary } from "./types.js";

export type ResultHandlerOptions = {
  outputPath: string;
  write?: (filePath: string, data: Buffer) => Promise<void>;
};

/** stock_image.png, stock_image_2.png, stock_image_3.png, ... */
export function artifactPath(outputPath: string, index: number): string {
  if (index === 0) return outputPath;
  const ext = path.extname(outputPath);
  const stem = outputPath.slice(0, outputPath.length - ext.length);
  return `${stem}_${index + 1}${ext}`;
}

export async function handleAnalysisResponse(
  response: AnalysisResponse,
  opts: ResultHandlerOptions,
): Promise<AnalysisSummary> {
  const texts: string[] = [];
  const images: Buffer[] = [];

  for (const item of response.items) {
    if (item.kind === "text") {
      const t = item.text.trim();
      if (t) texts.push(t);
    } else if (item.data.length > 0) {
      images.push(item.data);
    }
  }

  if (!texts.length && !images.length) throw new EmptyResponseError();

  const write = opts.write ?? writeBinary;
  const artifactPaths: string[] = [];
  for (const [i, data] of images.entries()) {
    const p = artifactPath(opts.outputPath, i);
    await write(p, data);
    artifactPaths.push(p);
  }

  return { reportText: texts.join("\n\n"), artifactPaths };
}
