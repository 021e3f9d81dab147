import { AnnotationParseError } from '../errors/conversion.error.js';
import type { ObjectMeta } from '../types/tenant.js';

const LIST_DELIMITER = ',';

const BOOLEAN_LITERALS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['t', true],
  ['1', true],
  ['false', false],
  ['f', false],
  ['0', false],
]);

/**
 * Joins values into a single annotation value. Returns `undefined` for an
 * empty list: the key must then be left out, never written as "".
 *
 * Values containing a comma are not supported, the delimiter is not escaped.
 */
export function joinList(values: readonly string[]): string | undefined {
  return values.length > 0 ? values.join(LIST_DELIMITER) : undefined;
}

/** Raw split. An empty string yields a single empty element. */
export function splitList(value: string): string[] {
  return value.split(LIST_DELIMITER);
}

/**
 * Reads a list annotation. Empty elements ("a,,b", "a,") are dropped, and a
 * value with no names left is treated the same as a missing key.
 */
export function readList(
  annotations: Readonly<Record<string, string>>,
  key: string,
): string[] | undefined {
  const value = annotations[key];
  if (value === undefined) {
    return undefined;
  }
  const names = splitList(value).filter((name) => name !== '');
  return names.length > 0 ? names : undefined;
}

export function parseBool(value: string, context: { tenant: string; key: string }): boolean {
  const parsed = BOOLEAN_LITERALS.get(value.toLowerCase());
  if (parsed === undefined) {
    throw new AnnotationParseError(context.tenant, context.key, value);
  }
  return parsed;
}

export function formatBool(value: boolean): string {
  return value ? 'true' : 'false';
}

export function purgeKeys(metadata: ObjectMeta, keys: readonly string[]): void {
  const annotations = metadata.annotations;
  if (annotations === undefined) {
    return;
  }
  for (const key of keys) {
    delete annotations[key];
  }
}
