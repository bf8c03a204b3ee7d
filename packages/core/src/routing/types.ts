export type RouteKind = "static" | "template" | "dynamic" | "directory-index";

/** Kinds a single file can be classified as. */
export type FileKind = Exclude<RouteKind, "directory-index">;

interface DescriptorBase {
  /** Slash-separated route key; "" is the content root. Unique per snapshot. */
  normalizedPath: string;
  absoluteFilePath: string;
  lastModified: Date;
  size: number;
  /** Entries of the directory for directory-index routes, 0 for files. */
  childCount: number;
}

export interface FileDescriptor extends DescriptorBase {
  kind: FileKind;
}

export interface DirectoryIndexDescriptor extends DescriptorBase {
  kind: "directory-index";
  /** The index file the directory serves. */
  index: FileDescriptor;
}

export type RouteDescriptor = FileDescriptor | DirectoryIndexDescriptor;

export interface DirectoryNode {
  normalizedPath: string;
  absolutePath: string;
  lastModified: Date;
  /** Visible entry names, sorted. */
  children: readonly string[];
}

export type ListingEntryKind = FileKind | "directory";

export interface ListingEntry {
  name: string;
  kind: ListingEntryKind;
}

export interface RouteMatch {
  type: "route";
  descriptor: RouteDescriptor;
  /** Extension appended during extensionless resolution, "" on a direct hit. */
  matchedSuffix: string;
  queryRemainder: string;
}

export interface ListingMatch {
  type: "listing";
  directory: DirectoryNode;
  entries: ListingEntry[];
  queryRemainder: string;
}

export type ResolvedRoute = RouteMatch | ListingMatch;
