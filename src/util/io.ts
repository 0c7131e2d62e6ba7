import fs from "fs-extra";

export async function writeBinary(filePath: string, data: Buffer): Promise<void> {
  await fs.outputFile(filePath, data);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.outputJson(filePath, data, { spaces: 2 });
}
