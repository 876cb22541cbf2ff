import { describe, it, expect } from 'vitest';
import { estimateMessageTokens, estimateTokens } from '../estimate.js';

describe('estimateTokens', () => {
  it('should round four characters per token up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
    expect(estimateTokens('SELECT * FROM orders')).toBe(5);
  });
});

describe('estimateMessageTokens', () => {
  it('should add per-message overhead and the output budget', () => {
    const messages = [{ content: 'abcdefgh' }, { content: 'abc' }];

    expect(estimateMessageTokens(messages, 100)).toBe(111);
  });

  it('should default the output budget to zero', () => {
    expect(estimateMessageTokens([{ content: 'abcd' }])).toBe(5);
    expect(estimateMessageTokens([])).toBe(0);
  });
});
