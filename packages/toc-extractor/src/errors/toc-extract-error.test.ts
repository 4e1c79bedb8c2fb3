import type { TocValidationResult } from './toc-extract-error';

import { describe, expect, test } from 'vitest';

import {
  DocumentNotFoundError,
  RenderingError,
  TocExtractError,
} from './toc-extract-error';

describe('TocExtractError', () => {
  test('creates error with message and cause', () => {
    const cause = new Error('original error');
    const error = new TocExtractError('wrapped message', { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TocExtractError');
    expect(error.message).toBe('wrapped message');
    expect(error.cause).toBe(cause);
  });

  describe('getErrorMessage', () => {
    test('returns message from Error instance', () => {
      expect(TocExtractError.getErrorMessage(new Error('boom'))).toBe('boom');
    });

    test('returns String() for non-Error values', () => {
      expect(TocExtractError.getErrorMessage('plain')).toBe('plain');
      expect(TocExtractError.getErrorMessage(42)).toBe('42');
      expect(TocExtractError.getErrorMessage(undefined)).toBe('undefined');
    });
  });

  describe('fromError', () => {
    test('prefixes context and keeps the cause', () => {
      const cause = new Error('EACCES');
      const error = TocExtractError.fromError('Cannot read issue.pdf', cause);

      expect(error).toBeInstanceOf(TocExtractError);
      expect(error.message).toBe('Cannot read issue.pdf: EACCES');
      expect(error.cause).toBe(cause);
    });
  });
});

describe('DocumentNotFoundError', () => {
  test('names the missing path', () => {
    const error = new DocumentNotFoundError('/scans/missing.pdf');

    expect(error).toBeInstanceOf(TocExtractError);
    expect(error.name).toBe('DocumentNotFoundError');
    expect(error.documentPath).toBe('/scans/missing.pdf');
    expect(error.message).toBe('Document not found: /scans/missing.pdf');
  });
});

describe('RenderingError', () => {
  const validationResult: TocValidationResult = {
    valid: false,
    errorCount: 2,
    issues: [
      {
        code: 'R001',
        message: 'Item section "FICTION" has no heading before it',
        path: '[0]',
        entry: { kind: 'item', section: 'FICTION', title: 'Story', page: 70 },
      },
      {
        code: 'R005',
        message: 'Duplicate section "BOOKS"',
        path: '[4]',
        entry: { kind: 'section', section: 'BOOKS' },
      },
    ],
  };

  test('keeps the validation result', () => {
    const error = new RenderingError('invalid', validationResult);

    expect(error).toBeInstanceOf(TocExtractError);
    expect(error.name).toBe('RenderingError');
    expect(error.validationResult).toBe(validationResult);
  });

  test('formats a summary of every issue', () => {
    const error = new RenderingError('invalid', validationResult);

    expect(error.getSummary()).toBe(
      [
        'ToC rendering failed: 2 error(s)',
        '',
        'Issues:',
        '  [R001] Item section "FICTION" has no heading before it',
        '    Path: [0]',
        '    Entry: item "Story" (page 70)',
        '  [R005] Duplicate section "BOOKS"',
        '    Path: [4]',
        '    Entry: section "BOOKS" (page -)',
      ].join('\n'),
    );
  });
});
