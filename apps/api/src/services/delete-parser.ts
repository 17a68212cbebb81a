// Delete-target parsing
//
// A delete request names its target either by position ("delete 1, 3") or by
// a keyword matched against reminder content ("delete reminder about rent").
//
// Examples:
//   parseIndices("1,1,2")                        -> [1, 2]
//   parseIndices("2 milk")                       -> null
//   extractDeleteKeyword("Delete reminders about rent") -> "rent"
//   extractDeleteKeyword("delete")               -> ""

const INDEX_LIST_PATTERN = /^\s*\d+(?:[\s,]+\d+)*\s*$/;

const DELETE_KEYWORD_PATTERN = /^\s*delete\b(?:\s+reminders?\b(?:\s+about\b)?)?\s*(.*)/i;

/**
 * Parse a list of 1-based positions. Returns null unless the whole input is
 * positive integers separated by commas and/or whitespace.
 */
export function parseIndices(input: string): number[] | null {
  if (!INDEX_LIST_PATTERN.test(input)) {
    return null;
  }

  const seen = new Set<number>();
  const indices: number[] = [];

  for (const part of input.split(/[\s,]+/)) {
    if (part === '') continue;

    const num = Number.parseInt(part, 10);
    if (num <= 0) {
      return null;
    }
    if (seen.has(num)) continue;

    seen.add(num);
    indices.push(num);
  }

  return indices.length > 0 ? indices : null;
}

/**
 * Extract the target of a "delete ..." message, or '' if the message is not a
 * delete request or names no target.
 */
export function extractDeleteKeyword(message: string): string {
  const match = DELETE_KEYWORD_PATTERN.exec(message);
  if (!match) {
    return '';
  }
  return (match[1] ?? '').trim();
}

export function formatIndices(indices: number[]): string {
  return indices.join(', ');
}
