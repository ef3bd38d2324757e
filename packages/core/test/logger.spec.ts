import { describe, it, expect } from 'vitest';
import { childLogger, logger, preview } from '../src/index.js';

describe('preview', () => {
  it('keeps short text as is', () => {
    expect(preview('list apps')).toBe('list apps');
    expect(preview('x'.repeat(100))).toBe('x'.repeat(100));
  });

  it('truncates long text', () => {
    expect(preview('x'.repeat(101))).toBe(`${'x'.repeat(100)}...`);
    expect(preview('abcdef', 3)).toBe('abc...');
  });

  it('never splits a surrogate pair', () => {
    const rocket = '\u{1F680}';
    expect(preview(`${'r'.repeat(99)}${rocket}${rocket}`)).toBe(`${'r'.repeat(99)}${rocket}...`);
    expect(preview(`${'r'.repeat(99)}${rocket}`)).toBe(`${'r'.repeat(99)}${rocket}`);
  });
});

describe('childLogger', () => {
  it('tags records with the component', () => {
    expect(childLogger('executor', logger).bindings()).toMatchObject({ component: 'executor' });
  });
});
