/**
 * Content Store
 *
 * Appends lines to, and reads back, a single text file on a persistent volume.
 */

import * as fs from "fs/promises";
import * as path from "path";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class ContentStore {
  constructor(readonly contentFile: string) {}

  /** Creates the parent directory. Run once before serving requests. */
  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.contentFile), { recursive: true });
  }

  // One append-mode write per call; concurrent callers interleave by whole lines
  async append(content: string): Promise<void> {
    const handle = await fs.open(this.contentFile, "a");
    try {
      await handle.writeFile(`${content}\n`, "utf-8");
    } finally {
      await handle.close();
    }
  }

  async read(): Promise<string> {
    try {
      return await fs.readFile(this.contentFile, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        return "";
      }
      throw err;
    }
  }
}
