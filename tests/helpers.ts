import { expect } from 'vitest';
import { MalformedEncodingError } from '../src/errors';

const encoder = new TextEncoder();

/**
 * UTF-8 bytes of a string.
 */
export function utf8Bytes(s: string): Uint8Array {
  return encoder.encode(s);
}

/**
 * Asserts that `fn` throws MalformedEncodingError at `offset`.
 */
export function expectMalformed(fn: () => unknown, offset: number): void {
  let caught: unknown;
  try {
    fn();
  } catch (e) {
    caught = e;
  }
  expect(caught).toBeInstanceOf(MalformedEncodingError);
  if (caught instanceof MalformedEncodingError) {
    expect(caught.offset).toBe(offset);
  }
}
