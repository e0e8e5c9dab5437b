/**
 * Test helpers.
 */

import { SomeIpError } from "../src/index.js";

/**
 * Runs `fn` and returns the code of the codec error it throws, or undefined
 * if it returns normally. Other errors are rethrown.
 */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof SomeIpError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

export function hex(data: Uint8Array): number[] {
  return Array.from(data);
}
