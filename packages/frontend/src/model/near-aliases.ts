/**
 * Near-aliases: entry points that are not true aliases (they differ in
 * details such as whether a non-generated name raises an error) but are
 * acceptable fallbacks for each other.
 *
 * Literal data. Similar-looking APPLE/EXT/core pairs elsewhere in the
 * registry are not interchangeable, so nothing here is inferred from names.
 */

export type NearAliasPair = readonly [string, string];

export const NEAR_ALIAS_PAIRS: readonly NearAliasPair[] = [
  ["glBindVertexArray", "glBindVertexArrayAPPLE"],
  ["glBindFramebuffer", "glBindFramebufferEXT"],
  ["glBindRenderbuffer", "glBindRenderbufferEXT"],
];

/**
 * Symmetric lookup: name -> its near-alias partner
 */
export const nearAliasIndex = (
  pairs: readonly NearAliasPair[] = NEAR_ALIAS_PAIRS
): ReadonlyMap<string, string> => {
  const index = new Map<string, string>();
  for (const [a, b] of pairs) {
    index.set(a, b);
    index.set(b, a);
  }
  return index;
};
