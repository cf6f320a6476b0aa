import { describe, it, expect } from 'vitest';
import { name, BatchRunner, Orchestrator, Validator, route } from './index';

describe('core package', () => {
  it('exports name', () => {
    expect(name).toBe('@envforge/core');
  });

  it('exports the pipeline entry points', () => {
    expect(typeof BatchRunner).toBe('function');
    expect(typeof Orchestrator).toBe('function');
    expect(typeof Validator).toBe('function');
    expect(typeof route).toBe('function');
  });
});
