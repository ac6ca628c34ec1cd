/**
 * Produces the parameter marker for the bound value at a 1-based position.
 */
export type PlaceholderFn = (position: number) => string;

/**
 * Either a fixed token written at every bound-value position (`?`, `%s`)
 * or a function of the position for dialects with numbered markers.
 */
export type Placeholder = string | PlaceholderFn;

/**
 * Numbered markers: `numbered()` yields `$1, $2, ...` (PostgreSQL),
 * `numbered(':')` yields `:1, :2, ...`.
 */
export function numbered(prefix = '$'): PlaceholderFn {
  return (position) => `${prefix}${position}`;
}

export function toPlaceholderFn(placeholder: Placeholder): PlaceholderFn {
  if (typeof placeholder === 'string') {
    return () => placeholder;
  }
  return placeholder;
}
