export {
  type RootNotFoundError,
  type RootResolver,
  formatRootNotFound,
} from "./RootResolver";
export {
  RootResolverDefault,
  type RootResolverOptions,
} from "./RootResolverDefault";
