import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DirectoryLister } from "@/services/DirectoryLister";
import type { ConcreteRoot } from "@/types";

import type {
  DepthLimitedWalker,
  WalkEntry,
  WalkOptions,
} from "./DepthLimitedWalker";
import { type NameMatcher, createNameMatcher } from "./NameMatcher";

type Frame = {
  depthLimit: number;
  matches: NameMatcher;
  entriesOnly: boolean;
};

export class DepthLimitedWalkerDefault implements DepthLimitedWalker {
  constructor(
    private readonly lister: DirectoryLister,
    private readonly logger: Logger
  ) {}

  async *walk(
    root: ConcreteRoot,
    options: WalkOptions
  ): AsyncGenerator<WalkEntry> {
    const frame: Frame = {
      depthLimit: options.depth,
      matches: createNameMatcher(options.filter),
      entriesOnly: options.filter.entriesOnly,
    };

    // 根目錄本身是檔案：只判斷是否輸出自己
    if (!root.isDirectory) {
      const name = path.basename(root.path);
      if (frame.matches(name)) {
        yield {
          name,
          path: root.path,
          parentPath: path.dirname(root.path),
          isDirectory: false,
          isSymbolicLink: false,
          depth: 0,
        };
      }
      return;
    }

    yield* this.walkFrom(root.path, frame, 0);
  }

  private async *walkFrom(
    location: string,
    frame: Frame,
    currentDepth: number
  ): AsyncGenerator<WalkEntry> {
    const workingDepth = currentDepth + 1;
    const children = await this.lister.list(location);

    for (const child of children) {
      if (
        frame.matches(child.name) &&
        !(frame.entriesOnly && child.isDirectory)
      ) {
        yield { ...child, depth: workingDepth };
      }

      if (!child.isDirectory) continue;

      if (workingDepth <= frame.depthLimit) {
        yield* this.walkFrom(child.path, frame, workingDepth);
      } else {
        this.logger.debug({
          event: "skip",
          path: child.path,
          currentDepth: workingDepth,
          depthLimit: frame.depthLimit,
        })`深度 ${workingDepth} 超過限制 ${frame.depthLimit}，略過子目錄`;
      }
    }
  }
}
