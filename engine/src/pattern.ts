/**
 * pkgdex Engine — Glob Patterns
 *
 * Compiles user-supplied globs into case-insensitive matchers.
 *
 *   "mpi"      → "*mpi*"  (no wildcard: substring match)
 *   "py-*"     → anchored glob, "*" matches any run of characters
 *   "r-?"      → "?" matches exactly one character
 *   "lib[!x]*" → character classes, "!" negates
 */

import { PatternError } from "./errors";

export interface PatternMatcher {
  /** Pattern as the user typed it */
  readonly raw: string;
  /** Glob actually compiled */
  readonly glob: string;
  matches(candidate: string): boolean;
}

const REGEX_SPECIAL = /[\\^$.*+?()[\]{}|/]/g;

function escapeRegex(s: string): string {
  return s.replace(REGEX_SPECIAL, "\\$&");
}

/**
 * Translate a bracket expression starting at `glob[start] === "["`.
 * Returns the regex source and the index just past the closing "]".
 */
function translateClass(raw: string, glob: string, start: number): [string, number] {
  let i = start + 1;
  let negate = false;
  if (glob[i] === "!") {
    negate = true;
    i++;
  }

  // A "]" right after the opening bracket is a literal member
  let end = glob[i] === "]" ? i + 1 : i;
  while (end < glob.length && glob[end] !== "]") end++;
  if (end >= glob.length) {
    throw new PatternError(raw, `unterminated character class at position ${start}`);
  }

  const body = glob.slice(i, end).replace(/[\\^\]]/g, "\\$&");
  return [`[${negate ? "^" : ""}${body}]`, end + 1];
}

/**
 * Translate a glob into an anchored regular expression source.
 */
function globToRegexSource(raw: string, glob: string = raw): string {
  let source = "";
  let i = 0;
  while (i < glob.length) {
    const ch = glob[i];
    if (ch === "*") {
      source += ".*";
      i++;
    } else if (ch === "?") {
      source += ".";
      i++;
    } else if (ch === "[") {
      const [cls, next] = translateClass(raw, glob, i);
      source += cls;
      i = next;
    } else {
      source += escapeRegex(ch);
      i++;
    }
  }
  return `^${source}$`;
}

/**
 * Compile a glob. A pattern without "*" or "?" matches anywhere in the
 * candidate, as if it were written "*pattern*".
 *
 * @throws PatternError when the glob cannot be compiled
 */
export function compilePattern(raw: string): PatternMatcher {
  const glob = raw.includes("*") || raw.includes("?") ? raw : `*${raw}*`;

  let regex: RegExp;
  try {
    // "s" lets wildcards span the lines of multi-line descriptions
    regex = new RegExp(globToRegexSource(raw, glob), "is");
  } catch (err) {
    if (err instanceof PatternError) throw err;
    throw new PatternError(raw, err instanceof Error ? err.message : String(err));
  }

  return {
    raw,
    glob,
    matches: (candidate: string) => regex.test(candidate),
  };
}
