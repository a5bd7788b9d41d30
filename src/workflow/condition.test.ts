import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../utils/logger.js';
import { evaluateCondition, lookupField } from './condition.js';

describe('evaluateCondition', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should match equal values on a mapping', () => {
    expect(evaluateCondition({ field: 'x', operator: 'equals', value: 5 }, { x: 5 })).toBe(true);
    expect(evaluateCondition({ field: 'x', operator: 'equals', value: '5' }, { x: 5 })).toBe(false);
  });

  it('should compare nested objects by value', () => {
    const condition = { field: 'meta', operator: 'equals', value: { a: 1 } };
    expect(evaluateCondition(condition, { meta: { a: 1 } })).toBe(true);
    expect(evaluateCondition(condition, { meta: { a: 2 } })).toBe(false);
  });

  it('should return false and warn when numeric coercion fails', () => {
    const warn = vi.spyOn(logger, 'warn');

    const result = evaluateCondition({ field: 'x', operator: 'greater_than', value: 'abc' }, { x: 5 });

    expect(result).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe("[CONDITION] Cannot compare 'x' numerically");
  });

  it('should coerce numeric strings for greater_than and less_than', () => {
    expect(evaluateCondition({ field: 'score', operator: 'less_than', value: 10 }, { score: '3' })).toBe(true);
    expect(evaluateCondition({ field: 'score', operator: 'greater_than', value: '2.5' }, { score: 3 })).toBe(true);
    expect(evaluateCondition({ field: 'score', operator: 'greater_than', value: 3 }, { score: 3 })).toBe(false);
  });

  it('should test string containment, prefix and suffix on the string form', () => {
    const message = { status: 'needs review', code: 404 };
    expect(evaluateCondition({ field: 'status', operator: 'contains', value: 'review' }, message)).toBe(true);
    expect(evaluateCondition({ field: 'status', operator: 'starts_with', value: 'needs' }, message)).toBe(true);
    expect(evaluateCondition({ field: 'status', operator: 'ends_with', value: 'needs' }, message)).toBe(false);
    expect(evaluateCondition({ field: 'code', operator: 'starts_with', value: 4 }, message)).toBe(true);
  });

  it('should read fields from a message holding a JSON object', () => {
    const message = '{"priority": "high", "score": 0.9}';
    expect(evaluateCondition({ field: 'priority', operator: 'equals', value: 'high' }, message)).toBe(true);
    expect(evaluateCondition({ field: 'score', operator: 'greater_than', value: 0.5 }, message)).toBe(true);
  });

  it('should not resolve attributes of a plain string message', () => {
    expect(evaluateCondition({ field: 'length', operator: 'greater_than', value: 0 }, 'hello')).toBe(false);
    expect(evaluateCondition({ field: '0', operator: 'equals', value: 'h' }, 'hello')).toBe(false);
    expect(evaluateCondition({ field: 'toUpperCase', operator: 'contains', value: 'function' }, 'hello')).toBe(false);
  });

  it('should return false when the field cannot be resolved', () => {
    expect(evaluateCondition({ field: 'missing', operator: 'equals', value: 1 }, { x: 1 })).toBe(false);
    expect(evaluateCondition({ field: 'label', operator: 'contains', value: 'a' }, 'plain text')).toBe(false);
    expect(evaluateCondition({ field: 'label', operator: 'equals', value: null }, null)).toBe(false);
  });

  it('should return false and warn for an unknown operator', () => {
    const warn = vi.spyOn(logger, 'warn');

    expect(evaluateCondition({ field: 'x', operator: 'matches', value: 'x' }, { x: 'x' })).toBe(false);
    expect(warn).toHaveBeenCalledWith('[CONDITION] Unknown operator: matches');
  });
});

describe('lookupField', () => {
  it('should expose own non-index properties of other objects', () => {
    expect(lookupField(['a', 'b'], 'length')).toEqual({ found: true, value: 2 });
    expect(lookupField(['a', 'b'], '1')).toEqual({ found: false });
    expect(lookupField(['a', 'b'], 'map')).toEqual({ found: false });
  });

  it('should not treat JSON arrays as mappings', () => {
    expect(lookupField('[1, 2]', 'length')).toEqual({ found: false });
    expect(lookupField('{"length": 3}', 'length')).toEqual({ found: true, value: 3 });
  });
});
