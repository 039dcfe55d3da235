/** 可接受的最大深度 */
export const MAX_DEPTH = 255;

export const DEFAULT_NAME_PATTERN = "*";

/** picomatch 選項：只支援 `*`、`?` 與 `[...]`，不展開大括號、不支援 `!` 反向 */
export const globSyntaxOptions = {
  dot: true,
  nobrace: true,
  nonegate: true,
  noextglob: true,
} as const;
