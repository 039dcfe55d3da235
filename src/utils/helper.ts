import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function isHostCaseInsensitive(
  platform: NodeJS.Platform = process.platform
) {
  return platform === "win32" || platform === "darwin";
}

export function isNotFoundError(error: unknown) {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * 路徑不存在時回傳 undefined，其他錯誤照常拋出。
 */
export async function statIfExists(p: string) {
  try {
    return await stat(p);
  } catch (error) {
    if (isNotFoundError(error)) return undefined;
    throw error;
  }
}
