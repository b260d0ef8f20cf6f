import { describe, it, expect } from 'vitest';
import { createConverter, createConfigStore, parseDotFormat, strftime } from './index.js';

describe('core package', () => {
  it('exports the conversion façade and its building blocks', () => {
    expect(typeof createConverter).toBe('function');
    expect(typeof createConfigStore).toBe('function');
    expect(typeof parseDotFormat).toBe('function');
    expect(typeof strftime).toBe('function');
  });

  it('converts with the shipped defaults', () => {
    const converter = createConverter();
    expect(converter.convert('2024-01-15 14:30:00')).toEqual({
      ok: true,
      value: '2024-01-15 09:30:00 EST',
    });
  });
});
