import { InvalidArgumentError } from 'commander';

/** Largest delay a Node timer accepts; anything above fires after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function timeoutMs(value: string): number {
  const parsed = positiveInt(value);
  if (parsed > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMEOUT_MS} milliseconds.`);
  }
  return parsed;
}
