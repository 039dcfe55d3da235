import type { Result } from "~shared/utils/Result";

import type { ConcreteRoot, RootSpecification } from "@/types";

export type RootNotFoundError = {
  type: "ROOT_NOT_FOUND";
  spec: RootSpecification;
  message: string;
};

export interface RootResolver {
  /**
   * 將使用者輸入的路徑轉成實際存在的根目錄。
   * 找不到時回傳 ROOT_NOT_FOUND；其他錯誤（例如路徑格式錯誤）直接拋出。
   */
  resolve(
    spec: RootSpecification
  ): Promise<Result<ConcreteRoot[], RootNotFoundError>>;
}

export function formatRootNotFound(spec: RootSpecification) {
  const mode = spec.kind === "pattern" ? "Path" : "LiteralPath";
  return `${mode} not found: '${spec.text}'`;
}
