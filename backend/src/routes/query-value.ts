import { invalidParameter } from '../errors.js';

/** Express query values may repeat (`?q=a&q=b`); only single strings are accepted. */
export function queryValue(value: unknown, parameter: string): string | undefined {
  if (value === undefined || typeof value === 'string') return value;
  throw invalidParameter(parameter, `${parameter} must be given once`);
}
