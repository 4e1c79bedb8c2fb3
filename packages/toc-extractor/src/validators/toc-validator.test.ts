import type { TocEntry } from '@magtoc/model';

import { beforeEach, describe, expect, test } from 'vitest';

import { RenderingError } from '../errors/toc-extract-error';
import { TocValidator } from './toc-validator';

describe('TocValidator', () => {
  let validator: TocValidator;

  beforeEach(() => {
    validator = new TocValidator();
  });

  test('accepts well-ordered entries', () => {
    const entries: TocEntry[] = [
      { kind: 'item', section: 'CONTENTS', title: 'Opening', page: 2 },
      { kind: 'section', section: 'FICTION', page: 70 },
      { kind: 'item', section: 'FICTION', title: 'The Visit', page: 70 },
    ];

    expect(validator.validate(entries)).toEqual({
      valid: true,
      issues: [],
      errorCount: 0,
    });
  });

  test('R001: item before its section heading', () => {
    const entries: TocEntry[] = [
      { kind: 'item', section: 'FICTION', title: 'The Visit', page: 70 },
      { kind: 'section', section: 'FICTION' },
    ];

    const result = validator.validate(entries);

    expect(result.issues).toEqual([
      {
        code: 'R001',
        message: 'Item section "FICTION" has no heading before it',
        path: '[0]',
        entry: entries[0],
      },
    ]);
  });

  test('R002: page out of range', () => {
    const result = validator.validate([
      { kind: 'section', section: 'FICTION', page: 1000 },
    ]);

    expect(result.issues[0].code).toBe('R002');
    expect(result.issues[0].message).toBe(
      'Page must be within 1..999, got 1000',
    );
  });

  test('R003: item without title', () => {
    const result = validator.validate([
      { kind: 'item', section: 'CONTENTS', title: '  ', page: 4 },
    ]);

    expect(result.issues.map((issue) => issue.code)).toEqual(['R003']);
  });

  test('R004: duplicate item', () => {
    const result = validator.validate([
      { kind: 'item', section: 'CONTENTS', title: 'Opening', page: 2 },
      { kind: 'item', section: 'CONTENTS', title: 'opening', page: 2 },
    ]);

    expect(result.issues.map((issue) => [issue.code, issue.path])).toEqual([
      ['R004', '[1]'],
    ]);
  });

  test('R005: duplicate section', () => {
    const result = validator.validate([
      { kind: 'section', section: 'BOOKS' },
      { kind: 'section', section: 'BOOKS', page: 80 },
    ]);

    expect(result.errorCount).toBe(1);
    expect(result.issues[0].code).toBe('R005');
  });

  test('validateOrThrow throws RenderingError with the result', () => {
    const entries: TocEntry[] = [
      { kind: 'item', section: 'FICTION', title: 'The Visit', page: 70 },
    ];

    expect(() => validator.validateOrThrow(entries)).toThrow(RenderingError);
    expect(() => validator.validateOrThrow(entries)).toThrow(
      'ToC entries are inconsistent: 1 error(s)',
    );
  });

  test('resets issues between runs', () => {
    validator.validate([{ kind: 'section', section: 'A', page: 0 }]);

    expect(validator.validate([]).valid).toBe(true);
  });
});
