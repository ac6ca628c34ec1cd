import { InvalidIdentifierError, InvalidPathError } from './errors.js';

/** Suffix marking a property whose column stores an encoded list. */
export const MULTI_VALUED_MARKER = '[*]';

// Hyphens are allowed between word characters: object type names such as
// `ipv4-addr` are table names. `--` never matches.
const WORD = '[A-Za-z0-9_]+(?:-[A-Za-z0-9_]+)*';
const NAME_PATTERN = new RegExp(`^(?=[A-Za-z_])${WORD}$`);
const PATH_PATTERN = new RegExp(`^(?=[A-Za-z_])${WORD}(?:\\.${WORD})*(?:\\[\\*\\])?$`);

/**
 * Rejects anything that is not a bare identifier (table name, alias).
 * Every identifier interpolated into SQL text passes through here or
 * through validatePath before it is appended to a query or rendered.
 */
export function validateName(name: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw new InvalidIdentifierError(name);
  }
}

/**
 * Rejects anything that is not a dotted property path, optionally ending
 * with the multi-valued marker.
 */
export function validatePath(path: string): void {
  if (!PATH_PATTERN.test(path)) {
    throw new InvalidPathError(path);
  }
}

export function isMultiValued(path: string): boolean {
  return path.endsWith(MULTI_VALUED_MARKER);
}

export function stripMultiValued(path: string): string {
  return isMultiValued(path) ? path.slice(0, -MULTI_VALUED_MARKER.length) : path;
}
