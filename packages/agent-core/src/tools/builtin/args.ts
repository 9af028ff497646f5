import { ValidationError } from '../../errors.js';

// Typed accessors for tool arguments. The executor has already checked them against the tool's
// JSON Schema; these narrow the values for the handler and guard direct callers.

export function requireString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`);
  }
  return value;
}

export function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`);
  }
  return value;
}

export function requireInteger(args: Record<string, unknown>, key: string): number {
  const value = args[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${key} must be an integer`);
  }
  return value;
}

export function optionalBoolean(args: Record<string, unknown>, key: string, defaultValue: boolean): boolean {
  const value = args[key];
  if (value === undefined || value === null) {
    return defaultValue;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${key} must be a boolean`);
  }
  return value;
}

export function optionalStringArray(args: Record<string, unknown>, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`${key} must be an array of strings`);
  }
  return value;
}

export function optionalStringRecord(args: Record<string, unknown>, key: string): Record<string, string> | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ValidationError(`${key} must be an object of string values`);
  }
  const record: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new ValidationError(`${key}.${name} must be a string`);
    }
    record[name] = entry;
  }
  return record;
}

export function optionalRange(args: Record<string, unknown>, key: string): [number, number] | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || value.length !== 2 || !value.every((item): item is number => Number.isInteger(item))) {
    throw new ValidationError(`${key} must be an array of two integers`);
  }
  return [value[0], value[1]];
}
