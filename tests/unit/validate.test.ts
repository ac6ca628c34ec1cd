import { describe, it, expect } from 'vitest';
import { validateName, validatePath, isMultiValued, stripMultiValued } from '../../src/validate.js';
import { InvalidIdentifierError, InvalidPathError } from '../../src/errors.js';

describe('validateName', () => {
  it.each(['people', 'ipv4-addr', '_tmp', 'x_foo2'])('accepts %s', (name) => {
    expect(() => validateName(name)).not.toThrow();
  });

  it.each([
    '',
    'a.b',
    'people"',
    "people'",
    'people;',
    'people--',
    'a/*b',
    'two words',
    '1table',
    'tags[*]',
  ])('rejects %j', (name) => {
    expect(() => validateName(name)).toThrow(InvalidIdentifierError);
  });

  it('carries the rejected identifier', () => {
    expect(() => validateName('x"; DROP TABLE people; --')).toThrow(
      expect.objectContaining({
        name: 'InvalidIdentifierError',
        identifier: 'x"; DROP TABLE people; --',
      }),
    );
  });
});

describe('validatePath', () => {
  it.each(['name', 'src_ref.value', 'extensions.x-ext.count', 'labels[*]', 'a.b[*]'])(
    'accepts %s',
    (path) => {
      expect(() => validatePath(path)).not.toThrow();
    },
  );

  it.each([
    '',
    '.name',
    'name.',
    'a..b',
    'labels[*].x',
    'labels[0]',
    'name"',
    "name'",
    'name;',
    'name--',
    'name/*',
    'a b',
  ])('rejects %j', (path) => {
    expect(() => validatePath(path)).toThrow(InvalidPathError);
  });
});

describe('multi-valued marker', () => {
  it('detects the marker', () => {
    expect(isMultiValued('labels[*]')).toBe(true);
    expect(isMultiValued('labels')).toBe(false);
  });

  it('strips the marker', () => {
    expect(stripMultiValued('labels[*]')).toBe('labels');
    expect(stripMultiValued('labels')).toBe('labels');
  });
});
