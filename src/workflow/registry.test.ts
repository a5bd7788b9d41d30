import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger } from '../utils/logger.js';
import { FunctionRegistry, ToolRegistry } from './registry.js';

describe('FunctionRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register functions from the constructor and by name', () => {
    const registry = new FunctionRegistry({ upper: ({ input }) => String(input).toUpperCase() });
    registry.register('lower', ({ input }) => String(input).toLowerCase());

    expect(registry.names()).toEqual(['upper', 'lower']);
    expect(registry.has('lower')).toBe(true);
    expect(registry.get('missing')).toBeUndefined();
  });

  it('should warn when a name is registered twice', () => {
    const warn = vi.spyOn(logger, 'warn');
    const registry = new FunctionRegistry({ fn: () => 'a' });

    registry.register('fn', () => 'b');

    expect(warn).toHaveBeenCalledWith("Function 'fn' re-registered, replacing previous definition");
    expect(registry.get('fn')?.({})).toBe('b');
  });
});

describe('ToolRegistry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const search = { name: 'search', description: 'Search the web' };
  const shell = { name: 'shell' };

  it('should hand out every tool when no names are given', () => {
    const registry = new ToolRegistry([search, shell]);

    expect(registry.resolve()).toEqual([search, shell]);
    expect(registry.resolve([])).toEqual([]);
  });

  it('should skip unknown tool names', () => {
    const warn = vi.spyOn(logger, 'warn');
    const registry = new ToolRegistry([search, shell]);

    expect(registry.resolve(['shell', 'browser'])).toEqual([shell]);
    expect(warn).toHaveBeenCalledWith("Tool 'browser' not found, skipping");
  });
});
