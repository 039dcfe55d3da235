export type { DirectoryEntry, DirectoryLister } from "./DirectoryLister";
export { DirectoryListerDefault } from "./DirectoryListerDefault";
