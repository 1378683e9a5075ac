import { describe, it, expect } from 'vitest';
import { parseEditRequest, parseEditRequests } from '../editRequest';

describe('parseEditRequest', () => {
  it('decodes the snake_case wire format', () => {
    expect(
      parseEditRequest({
        location: 'Chapter 2',
        original_text: '# 2 Method',
        modified_text: '# 2 Approach',
        reason: 'terminology',
        modification_type: 'rename',
        is_full_chapter: true,
      })
    ).toEqual({
      location: 'Chapter 2',
      originalText: '# 2 Method',
      modifiedText: '# 2 Approach',
      reason: 'terminology',
      modificationType: 'rename',
      isFullChapter: true,
    });
  });

  it('accepts camelCase and fills optional fields', () => {
    expect(parseEditRequest({ originalText: 'a', modifiedText: 'b' })).toEqual({
      location: '',
      originalText: 'a',
      modifiedText: 'b',
      reason: '',
      modificationType: '',
      isFullChapter: false,
    });
  });

  it('prefers snake_case when both spellings are present', () => {
    const edit = parseEditRequest({ original_text: 'snake', originalText: 'camel', modified_text: 'x' });
    expect(edit?.originalText).toBe('snake');
  });

  it('reads a string "true" as a full-chapter flag', () => {
    const edit = parseEditRequest({ original_text: '# 1', modified_text: 'x', is_full_chapter: 'true' });
    expect(edit?.isFullChapter).toBe(true);
  });

  it('rejects entries without string anchor and replacement', () => {
    expect(parseEditRequest({ original_text: 'a' })).toBeNull();
    expect(parseEditRequest({ original_text: 1, modified_text: 'b' })).toBeNull();
    expect(parseEditRequest('text')).toBeNull();
    expect(parseEditRequest(null)).toBeNull();
    expect(parseEditRequest([])).toBeNull();
  });
});

describe('parseEditRequests', () => {
  it('keeps valid entries in order and lists rejected positions', () => {
    const result = parseEditRequests([
      { original_text: 'a', modified_text: 'b' },
      { original_text: 'c' },
      { original_text: 'd', modified_text: 'e' },
    ]);

    expect(result.edits.map((e) => e.originalText)).toEqual(['a', 'd']);
    expect(result.rejected).toEqual([1]);
  });

  it('returns nothing for a non-array', () => {
    expect(parseEditRequests({ modifications: [] })).toEqual({ edits: [], rejected: [] });
  });
});
