import { access, mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { IOFailure } from "./errors.js";

export type WriteOutcome = "created" | "overwritten" | "skipped";

export interface TextFileSink {
  /** Throws IOFailure when the file cannot be written */
  write(path: string, content: string, overwrite: boolean): Promise<WriteOutcome>;
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes text files to disk, creating parent directories as needed.
 */
export class NodeFileSink implements TextFileSink {
  async write(path: string, content: string, overwrite: boolean): Promise<WriteOutcome> {
    const existed = await fileExists(path);
    if (existed && !overwrite) {
      return "skipped";
    }
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, "utf-8");
    } catch (error) {
      throw new IOFailure(path, { cause: error });
    }
    return existed ? "overwritten" : "created";
  }
}
