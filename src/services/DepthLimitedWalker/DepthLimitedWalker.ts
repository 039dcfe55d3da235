import type { DirectoryEntry } from "@/services/DirectoryLister";
import type { ConcreteRoot, FilterCriteria } from "@/types";

export type WalkEntry = DirectoryEntry & {
  /** 列出此項目時的深度，根目錄的子項目為 1，根目錄本身為 0 */
  depth: number;
};

export type WalkOptions = {
  /** 根目錄之下最多可列出的層數，0 表示只列出根目錄的直接子項目 */
  depth: number;
  filter: FilterCriteria;
};

export interface DepthLimitedWalker {
  walk(root: ConcreteRoot, options: WalkOptions): AsyncGenerator<WalkEntry>;
}
