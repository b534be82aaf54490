import { describe, it, expect, beforeEach } from 'vitest';
import { IdGenerator } from './id-generator.js';

describe('IdGenerator', () => {
  let generator: IdGenerator;

  beforeEach(() => {
    generator = new IdGenerator('test');
  });

  it('generates unique IDs within the same millisecond', () => {
    const ids = Array.from({ length: 50 }, () => generator.next());
    expect(new Set(ids).size).toBe(50);
  });

  it('starts with the prefix and ends with a zero-padded counter', () => {
    const id = generator.next();
    expect(id.startsWith('test-')).toBe(true);
    expect(id.endsWith('-0000')).toBe(true);
    expect(generator.next().endsWith('-0001')).toBe(true);
  });


  it('keeps counting across generators with different prefixes independently', () => {
    const other = new IdGenerator('w');
    generator.next();
    expect(other.next()).toMatch(/^w-[0-9a-z]+-0000$/);
    expect(generator.next().endsWith('-0001')).toBe(true);
  });
});
