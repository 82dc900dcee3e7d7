/** Parsed unified diff, one entry per file. */
export type LineKind = "added" | "removed" | "context";

export type PatchLine = {
  readonly kind: LineKind;
  /** Line content without the leading +, - or space. */
  readonly text: string;
};

export type Hunk = {
  readonly lines: readonly PatchLine[];
};

export type Patch = {
  /** New-file path as written in the `+++` header, e.g. "b/github/acme/widgets". */
  readonly newPath: string;
  readonly hunks: readonly Hunk[];
};
