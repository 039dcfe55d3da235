export type {
  DepthLimitedWalker,
  WalkEntry,
  WalkOptions,
} from "./DepthLimitedWalker";
export { DepthLimitedWalkerDefault } from "./DepthLimitedWalkerDefault";
export { type NameMatcher, createNameMatcher } from "./NameMatcher";
