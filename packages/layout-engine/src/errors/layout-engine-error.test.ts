import { describe, expect, test } from 'vitest';

import {
  InvalidEngineOptionsError,
  LayoutEngineError,
  MalformedElementError,
} from './layout-engine-error';

describe('LayoutEngineError', () => {
  test('getErrorMessage handles errors and other values', () => {
    expect(LayoutEngineError.getErrorMessage(new Error('boom'))).toBe('boom');
    expect(LayoutEngineError.getErrorMessage('plain')).toBe('plain');
    expect(LayoutEngineError.getErrorMessage(404)).toBe('404');
  });

  test('fromError prefixes context and keeps the cause', () => {
    const cause = new Error('store offline');

    const error = LayoutEngineError.fromError('Failed to commit page', cause);

    expect(error.name).toBe('LayoutEngineError');
    expect(error.message).toBe('Failed to commit page: store offline');
    expect(error.cause).toBe(cause);
  });
});

describe('MalformedElementError', () => {
  test('lists every issue in the summary', () => {
    const error = new MalformedElementError('Malformed page input', [
      {
        path: 'elements.0.bbox.x1',
        message: 'Number must be greater than or equal to 0',
      },
      { path: '', message: 'Required' },
    ]);

    expect(error).toBeInstanceOf(LayoutEngineError);
    expect(error.name).toBe('MalformedElementError');
    expect(error.getSummary()).toBe(
      [
        'Malformed page input: 2 issue(s)',
        '  elements.0.bbox.x1: Number must be greater than or equal to 0',
        '  (root): Required',
      ].join('\n'),
    );
  });
});

describe('InvalidEngineOptionsError', () => {
  test('joins issues into the message', () => {
    const error = new InvalidEngineOptionsError([
      { path: 'lookaheadMaxGroups', message: 'Expected integer' },
      { path: 'columnOrder', message: 'Invalid enum value' },
    ]);

    expect(error.name).toBe('InvalidEngineOptionsError');
    expect(error.message).toBe(
      'Invalid engine options: lookaheadMaxGroups: Expected integer; columnOrder: Invalid enum value',
    );
    expect(error.issues).toHaveLength(2);
  });
});
