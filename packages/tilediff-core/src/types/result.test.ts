import { describe, expect, test } from 'vitest';
import { createEmptyImageError } from './errors';
import { err, isErr, isOk, ok, unwrap, unwrapOr } from './result';

describe('Result helpers', () => {
  test('ok and err narrow', () => {
    expect(isOk(ok(1))).toBe(true);
    expect(isErr(ok(1))).toBe(false);
    expect(isErr(err('boom'))).toBe(true);
  });

  test('unwrap returns the value of a success', () => {
    expect(unwrap(ok(42))).toBe(42);
  });

  test('unwrap throws the message of an error object', () => {
    const failure = err(createEmptyImageError(['first image']));
    expect(() => unwrap(failure)).toThrow('image is empty: images: first image');
  });

  test('unwrap rethrows Error instances', () => {
    const error = new RangeError('out of range');
    expect(() => unwrap(err(error))).toThrow(error);
  });

  test('unwrap stringifies other failures', () => {
    expect(() => unwrap(err('plain'))).toThrow('plain');
  });

  test('unwrapOr falls back on failure', () => {
    expect(unwrapOr(err('x'), 7)).toBe(7);
    expect(unwrapOr(ok(3), 7)).toBe(3);
  });
});
