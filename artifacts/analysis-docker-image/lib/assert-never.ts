/**
 * Exhaustiveness helper for discriminated unions - a new union member
 * without a matching case fails to compile.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
