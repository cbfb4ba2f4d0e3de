import fs from "node:fs";
import { isNotFoundError } from "./errors";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

export async function fileSize(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.size;
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await fileSize(filePath)) !== undefined;
}
