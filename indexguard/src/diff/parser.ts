import { parsePatch } from "diff";
import type { Hunk, Patch, PatchLine } from "../types/patch.js";
import type { IndexChangeError } from "../types/report.js";
import { MAX_DIFF_SIZE } from "../security/limits.js";

export type DiffParseResult =
  | { ok: true; patches: Patch[] }
  | { ok: false; error: IndexChangeError };

function syntaxError(message: string): DiffParseResult {
  return { ok: false, error: { code: "DIFF_SYNTAX", message: `failed to parse diff: ${message}` } };
}

/*
 * parsePatch also breaks lines at \v, \f, U+0085 and a lone \r, all of which may appear
 * raw inside a JSON string. Those characters (and the escape mark itself) are replaced
 * by ESCAPE + digit before parsing and restored afterwards, so only \n and \r\n split.
 */
const ESCAPE = "\uE000";
const ESCAPED = [ESCAPE, "\u0085", "\v", "\f", "\r"];

function protectLineBreaks(text: string): string {
  return text.replace(/[\uE000\u0085\v\f]|\r(?!\n)/g, (ch) => `${ESCAPE}${ESCAPED.indexOf(ch)}`);
}

function restoreLineBreaks(text: string): string {
  return text.replace(/\uE000([0-4])/g, (_, i: string) => ESCAPED[Number(i)]);
}

function toLine(raw: string): PatchLine | null {
  switch (raw[0]) {
    case "+":
      return { kind: "added", text: restoreLineBreaks(raw.slice(1)) };
    case "-":
      return { kind: "removed", text: restoreLineBreaks(raw.slice(1)) };
    case "\\":
      // "\ No newline at end of file"
      return null;
    default:
      return { kind: "context", text: restoreLineBreaks(raw.slice(1)) };
  }
}

/**
 * Parse a multi-file unified diff (as produced by `git diff`) into patches.
 *
 * Any syntax problem fails the whole diff: a half-understood diff can't be trusted
 * to describe what the pull request really changes.
 */
export function parseDiff(text: string): DiffParseResult {
  if (text.trim().length === 0) {
    return syntaxError("diff contains no file patches");
  }
  if (text.length > MAX_DIFF_SIZE) {
    return syntaxError(`diff too large: ${text.length} bytes (max: ${MAX_DIFF_SIZE})`);
  }

  let parsed: ReturnType<typeof parsePatch>;
  try {
    parsed = parsePatch(protectLineBreaks(text), { strict: true });
  } catch (e) {
    return syntaxError(restoreLineBreaks(e instanceof Error ? e.message : String(e)));
  }

  const patches: Patch[] = [];
  for (const [i, file] of parsed.entries()) {
    if (!file.newFileName) {
      return syntaxError(`file patch ${i + 1} has no new-file header`);
    }
    const newPath = restoreLineBreaks(file.newFileName);

    const hunks: Hunk[] = [];
    for (const hunk of file.hunks) {
      if (Number.isNaN(hunk.oldStart) || Number.isNaN(hunk.newStart)) {
        return syntaxError(`malformed hunk header in ${newPath}`);
      }
      const lines: PatchLine[] = [];
      for (const raw of hunk.lines) {
        const line = toLine(raw);
        if (line) lines.push(line);
      }
      hunks.push({ lines });
    }

    patches.push({ newPath, hunks });
  }

  return { ok: true, patches };
}
