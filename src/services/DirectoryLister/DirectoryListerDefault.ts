import { readdir } from "node:fs/promises";
import path from "node:path";

import type { DirectoryEntry, DirectoryLister } from "./DirectoryLister";

export class DirectoryListerDefault implements DirectoryLister {
  async list(dirPath: string): Promise<DirectoryEntry[]> {
    const dirents = await readdir(dirPath, { withFileTypes: true });
    return dirents.map((d) => ({
      name: d.name,
      path: path.join(dirPath, d.name),
      parentPath: dirPath,
      isDirectory: d.isDirectory(),
      isSymbolicLink: d.isSymbolicLink(),
    }));
  }
}
