import { describe, it, expect } from 'vitest';
import { summarizePatch } from '../diffSummary';

describe('summarizePatch', () => {
  it('counts lines before and after', () => {
    const summary = summarizePatch('a\nb', 'a\nb\nc');
    expect(summary.originalLines).toBe(2);
    expect(summary.modifiedLines).toBe(3);
    expect(summary.lineDelta).toBe(1);
    expect(summary.text).toBe('lines: +1 (2 → 3)');
  });

  it('prints zero and negative deltas without a plus sign', () => {
    expect(summarizePatch('x', 'y').text).toBe('lines: 0 (1 → 1)');
    expect(summarizePatch('a\nb\nc', 'a\nb').text).toBe('lines: -1 (3 → 2)');
  });

  it('hashes both versions with sha256', () => {
    const summary = summarizePatch('', 'x');
    expect(summary.beforeHash).toBe('sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    expect(summary.afterHash).toMatch(/^sha256:[0-9a-f]{64}$/);
    expect(summary.afterHash).not.toBe(summary.beforeHash);
  });
});
