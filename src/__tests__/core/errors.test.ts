import { describe, expect, it } from 'vitest';
import { BackendError, ConfigError, extractErrorMessage, getErrorMessage } from '../../core/errors.js';

describe('extractErrorMessage', () => {
  it('pulls the nested message out of a JSON error body', () => {
    const error = new Error('Error code: 400 - {"error":{"message":"model not found","type":"invalid"}}');

    expect(extractErrorMessage(error)).toBe('model not found');
  });

  it('accepts a plain string error field', () => {
    expect(extractErrorMessage(new Error('{"error":"context too long"}'))).toBe('context too long');
  });

  it('falls back to a top-level message field', () => {
    expect(extractErrorMessage(new Error('502 {"message":"bad gateway"}'))).toBe('bad gateway');
  });

  it('reads the body of a backend error', () => {
    const error = new BackendError(404, '{"error":{"message":"no such model"}}');

    expect(extractErrorMessage(error)).toBe('no such model');
  });

  it('returns the raw message when there is no JSON', () => {
    expect(extractErrorMessage(new Error('connection refused'))).toBe('connection refused');
  });

  it('returns the raw message when the JSON is broken', () => {
    expect(extractErrorMessage(new Error('oops {not json'))).toBe('oops {not json');
  });

  it('handles non-Error values', () => {
    expect(extractErrorMessage('plain failure')).toBe('plain failure');
    expect(getErrorMessage(42)).toBe('42');
  });
});

describe('ConfigError', () => {
  it('lists every problem in the message', () => {
    const error = new ConfigError('Invalid configuration', ['a: bad', 'b: worse']);

    expect(error.message).toBe('Invalid configuration: a: bad; b: worse');
    expect(error.problems).toEqual(['a: bad', 'b: worse']);
  });
});
