export const MATCH_ALL = "*all*";

/** Disjunction of conjunctions; `null` stands for "matches everything". */
export type TagExpression = ReadonlyArray<ReadonlySet<string>> | null;

export function parseTagExpression(expression: string | null | undefined): TagExpression {
  if (expression === null || expression === undefined) return null;
  const trimmed = expression.trim();
  if (trimmed === "" || trimmed === MATCH_ALL) return null;

  const groups: Array<ReadonlySet<string>> = [];
  for (const part of trimmed.split("|")) {
    const tags = part.split(/\s+/).filter((t) => t.length > 0);
    if (tags.length > 0) groups.push(new Set(tags));
  }
  return groups;
}

export function matchesParsed(expr: TagExpression, tags: ReadonlySet<string>): boolean {
  if (expr === null) return true;
  return expr.some((group) => [...group].every((t) => tags.has(t)));
}

/**
 * `"a b | c"` reads as (a AND b) OR c. An empty expression and `*all*` match
 * any tag set, the empty one included.
 */
export function matches(expression: string | null | undefined, tags: Iterable<string>): boolean {
  return matchesParsed(parseTagExpression(expression), tags instanceof Set ? tags : new Set(tags));
}
