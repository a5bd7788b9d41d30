import { logger } from '../utils/logger.js';
import type { EdgeCondition } from './types.js';

type FieldLookup = { found: true; value: unknown } | { found: false };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{')) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

const INDEX_KEY = /^\d+$/;

/**
 * Mappings are searched by key. A string message holding a JSON object counts
 * as a mapping. Other objects expose their own non-index, non-method
 * properties; plain strings and primitives expose nothing.
 */
export function lookupField(message: unknown, field: string): FieldLookup {
  const mapping = isRecord(message) ? message : typeof message === 'string' ? parseJsonObject(message) : null;
  if (mapping) {
    return Object.prototype.hasOwnProperty.call(mapping, field)
      ? { found: true, value: mapping[field] }
      : { found: false };
  }

  if (typeof message !== 'object' || message === null || INDEX_KEY.test(field)) {
    return { found: false };
  }
  if (!Object.prototype.hasOwnProperty.call(message, field)) {
    return { found: false };
  }
  const value: unknown = Reflect.get(message, field);
  return typeof value === 'function' ? { found: false } : { found: true, value };
}

function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (isRecord(value) || Array.isArray(value)) return JSON.stringify(value);
  return String(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') return Number(value.trim());
  return Number.NaN;
}

function isEqual(left: unknown, right: unknown): boolean {
  if (left === right) return true;
  if (typeof left === 'object' && left !== null && typeof right === 'object' && right !== null) {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return false;
}

function compareNumbers(condition: EdgeCondition, actual: unknown, test: (a: number, b: number) => boolean): boolean {
  const left = toNumber(actual);
  const right = toNumber(condition.value);
  if (Number.isNaN(left) || Number.isNaN(right)) {
    logger.warn(`[CONDITION] Cannot compare '${condition.field}' numerically`, {
      operator: condition.operator,
      actual: toText(actual),
      expected: toText(condition.value),
    });
    return false;
  }
  return test(left, right);
}

export function evaluateCondition(condition: EdgeCondition, message: unknown): boolean {
  const lookup = lookupField(message, condition.field);
  if (!lookup.found) {
    return false;
  }
  const actual = lookup.value;

  switch (condition.operator) {
    case 'equals':
      return isEqual(actual, condition.value);
    case 'contains':
      return toText(actual).includes(toText(condition.value));
    case 'starts_with':
      return toText(actual).startsWith(toText(condition.value));
    case 'ends_with':
      return toText(actual).endsWith(toText(condition.value));
    case 'greater_than':
      return compareNumbers(condition, actual, (a, b) => a > b);
    case 'less_than':
      return compareNumbers(condition, actual, (a, b) => a < b);
    default:
      logger.warn(`[CONDITION] Unknown operator: ${condition.operator}`);
      return false;
  }
}
