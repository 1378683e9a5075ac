import { describe, it, expect } from 'vitest';
import { applyEdits, labelOf, locateAnchor, wouldDuplicate } from '../patchApplier';
import { RecordingObserver } from '../observer';
import type { EditRequest } from '../types';

/* ============= helpers ============= */

function makeEdit(overrides: Partial<EditRequest> = {}): EditRequest {
  return {
    location: 'loc',
    originalText: 'alpha',
    modifiedText: 'omega',
    reason: '',
    modificationType: '',
    isFullChapter: false,
    ...overrides,
  };
}

/* ============= locateAnchor ============= */

describe('locateAnchor', () => {
  it('prefers an exact hit with similarity 1', () => {
    expect(locateAnchor('beta', 'alpha beta')).toEqual({
      matchedText: 'beta',
      startOffset: 6,
      confidenceTier: 'exact',
      similarity: 1,
    });
  });

  it('falls back to the fuzzy tiers', () => {
    const hit = locateAnchor('alpha bravo charlie delta echo', 'alpha bravo charlie delta foxtrot');
    expect(hit?.confidenceTier).toBe('fuzzy_high');
  });
});

/* ============= labelOf ============= */

describe('labelOf', () => {
  it('falls back to a 1-based position when the location is blank', () => {
    expect(labelOf({ location: '  ' }, 2)).toBe('edit #3');
    expect(labelOf({ location: ' Chapter 1 ' }, 0)).toBe('Chapter 1');
  });
});

/* ============= wouldDuplicate ============= */

describe('wouldDuplicate', () => {
  const existing = 'The committee approved the new budget plan.';
  const doc = `Intro.\n\n${existing}\n\nOld text to rewrite.`;
  const regionStart = doc.indexOf('Old text');
  const region = { start: regionStart, end: regionStart + 'Old text to rewrite.'.length };

  it('is true when a long replacement already exists outside the region', () => {
    expect(wouldDuplicate(doc, region, existing, 'Old text to rewrite.')).toBe(true);
  });

  it('ignores replacements shorter than 20 characters', () => {
    expect(wouldDuplicate(doc, region, 'budget plan.', 'Old text to rewrite.')).toBe(false);
  });

  it('ignores replacements the anchor already contains', () => {
    expect(wouldDuplicate(doc, region, existing, `${existing} Old text to rewrite.`)).toBe(false);
  });

  it('is false when the replacement exists only inside the region', () => {
    const whole = { start: 0, end: doc.length };
    expect(wouldDuplicate(doc, whole, existing, 'x')).toBe(false);
  });
});

/* ============= applyEdits ============= */

describe('applyEdits', () => {
  it('replaces only the first occurrence of an exact anchor', () => {
    const { document, report } = applyEdits('alpha beta alpha', [makeEdit()]);
    expect(document).toBe('omega beta alpha');
    expect(report.applied).toEqual(['loc']);
    expect(report.outcomes[0]).toEqual({ index: 0, location: 'loc', status: 'applied', tier: 'exact' });
  });

  it('skips an edit that differs only in trailing whitespace', () => {
    const doc = 'X marks the spot';
    const { document, report } = applyEdits(doc, [makeEdit({ originalText: 'X', modifiedText: 'X  ' })]);

    expect(document).toBe(doc);
    expect(report.skippedNoop).toEqual(['loc']);
    expect(report.applied).toEqual([]);
  });

  it('processes only the first of identical normalized anchors', () => {
    const { document, report } = applyEdits('alpha and beta', [
      makeEdit({ location: 'first' }),
      makeEdit({ location: 'second', originalText: ' alpha\n', modifiedText: 'other' }),
    ]);

    expect(document).toBe('omega and beta');
    expect(report.applied).toEqual(['first']);
    expect(report.skippedDuplicate).toEqual(['second']);
  });

  it('fails an edit without an anchor', () => {
    const { report } = applyEdits('text', [makeEdit({ originalText: '  ' })]);
    expect(report.failed).toEqual([{ location: 'loc', reason: 'missing original_text' }]);
  });

  it('fails an anchor that cannot be located', () => {
    const { document, report } = applyEdits('text', [makeEdit({ originalText: 'nowhere' })]);

    expect(document).toBe('text');
    expect(report.failed).toEqual([{ location: 'loc', reason: 'anchor not found' }]);
    expect(report.outcomes[0].tier).toBe('not_found');
  });

  it('refuses a replacement that already exists elsewhere', () => {
    const doc = 'Intro.\n\nThe committee approved the new budget plan.\n\nOld text to rewrite.';
    const { document, report } = applyEdits(doc, [
      makeEdit({
        originalText: 'Old text to rewrite.',
        modifiedText: 'The committee approved the new budget plan.',
      }),
    ]);

    expect(document).toBe(doc);
    expect(report.failed).toEqual([
      { location: 'loc', reason: 'collision guard: replacement text already present' },
    ]);
  });

  it('applies a fuzzy match to the whole matched paragraph', () => {
    const doc = '# 1 Intro\n\nThe quick brown fox jumps over the lazy dog.\n\nOther stuff.';
    const { document, report } = applyEdits(doc, [
      makeEdit({
        originalText: 'The quick brown fox leaps over the lazy dog.',
        modifiedText: 'A new sentence about foxes.',
      }),
    ]);

    expect(document).toBe('# 1 Intro\n\nA new sentence about foxes.\n\nOther stuff.');
    expect(report.outcomes[0].tier).toBe('fuzzy_high');
    expect(report.lowConfidence).toEqual([]);
  });

  it('flags low-tier fuzzy hits as low confidence', () => {
    const doc = 'intro\n\nalpha bravo charlie golf hotel\n\nend';
    const { document, report } = applyEdits(doc, [
      makeEdit({
        originalText: 'alpha bravo charlie delta echo',
        modifiedText: 'replacement paragraph text',
      }),
    ]);

    expect(document).toBe('intro\n\nreplacement paragraph text\n\nend');
    expect(report.applied).toEqual(['loc']);
    expect(report.lowConfidence).toEqual(['loc']);
  });

  it('lets later edits see earlier substitutions', () => {
    const { document } = applyEdits('alpha gamma', [
      makeEdit({ location: 'a' }),
      makeEdit({ location: 'b', originalText: 'omega gamma', modifiedText: 'delta' }),
    ]);
    expect(document).toBe('delta');
  });

  it('notifies the observer at each checkpoint', () => {
    const observer = new RecordingObserver();
    applyEdits('alpha beta', [makeEdit(), makeEdit({ location: 'gone', originalText: 'missing' })], observer);

    expect(observer.events).toEqual([
      { type: 'exact_match', location: 'loc', offset: 0 },
      { type: 'applied', location: 'loc', tier: 'exact' },
      { type: 'not_found', location: 'gone', anchorPreview: 'missing' },
    ]);
  });
});
