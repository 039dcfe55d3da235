import picomatch from "picomatch";

import { DEFAULT_NAME_PATTERN, globSyntaxOptions } from "@/constants";
import type { FilterCriteria } from "@/types";
import { isHostCaseInsensitive } from "@/utils/helper";

export type NameMatcher = (name: string) => boolean;

/**
 * 只比對名稱（不含路徑）。`*` 任意長度、`?` 單一字元，包含以 `.` 開頭的名稱。
 * 使用 makeRe 而非 picomatch()，後者會把與樣式字面相同的名稱也當成符合。
 */
export function createNameMatcher(
  filter: Pick<FilterCriteria, "namePattern" | "caseSensitive">,
  platform: NodeJS.Platform = process.platform
): NameMatcher {
  if (filter.namePattern === DEFAULT_NAME_PATTERN) return () => true;
  const caseSensitive = filter.caseSensitive ?? !isHostCaseInsensitive(platform);
  const re = picomatch.makeRe(filter.namePattern, {
    ...globSyntaxOptions,
    nocase: !caseSensitive,
  });
  return (name) => re.test(name);
}
