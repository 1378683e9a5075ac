import { describe, it, expect } from 'vitest';
import {
  assertPatchableDocument,
  expandHeading,
  MalformedDocumentError,
  patch,
  patchMany,
  RecordingObserver,
} from '../index';
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

/* ============= patch ============= */

describe('patch', () => {
  it('replaces the first of two identical sentences and leaves the other', () => {
    const lstm = 'System X uses LSTM for classification.';
    const doc = `# 1 Method\n\n${lstm}\n\nResults follow.\n\n${lstm}\n`;

    const { document, report } = patch(doc, [
      makeEdit({
        location: 'Method',
        originalText: lstm,
        modifiedText: 'System X uses Transformer for classification.',
      }),
    ]);

    expect(document).toBe(
      `# 1 Method\n\nSystem X uses Transformer for classification.\n\nResults follow.\n\n${lstm}\n`
    );
    expect(document.split(lstm)).toHaveLength(2);
    expect(report.applied).toContain('Method');
  });

  it('leaves the document unchanged for a whitespace-only difference', () => {
    const doc = 'X marks the spot';
    const { document, report } = patch(doc, [makeEdit({ location: 'L1', originalText: 'X', modifiedText: 'X  ' })]);

    expect(document).toBe(doc);
    expect(report.skippedNoop).toEqual(['L1']);
  });

  it('expands a chapter edit and drops the subsection edit it covers', () => {
    const doc = '# 3 Design\nOld design text.\n## 3.1 Vision\nOld vision.\n# 4 Next\nKeep.';
    const observer = new RecordingObserver();

    const { document, report } = patch(
      doc,
      [
        makeEdit({
          location: 'Chapter 3',
          originalText: '# 3 Design',
          modifiedText: '# 3 Design\nNew design text.',
          isFullChapter: true,
        }),
        makeEdit({
          location: 'Section 3.1',
          originalText: '## 3.1 Vision',
          modifiedText: '## 3.1 Vision\nNew vision.',
          isFullChapter: true,
        }),
      ],
      { observer }
    );

    expect(document).toBe('# 3 Design\nNew design text.\n# 4 Next\nKeep.');
    expect(report.applied).toEqual(['Chapter 3']);
    expect(report.skippedDuplicate).toEqual(['Section 3.1']);
    expect(report.outcomes[1]).toEqual({
      index: 1,
      location: 'Section 3.1',
      status: 'skipped_subsumed',
      reason: 'covered by Chapter 3',
    });
    expect(observer.events.map((e) => e.type)).toEqual([
      'subsumed',
      'expanded',
      'exact_match',
      'applied',
      'swept',
    ]);
  });

  it('keeps a subsection edit whose anchor carries body text after the heading', () => {
    const doc = '# 3 Design\nOld design intro.\n\n## 3.1 Vision\nOld vision.\n# 4 Next\nKeep.';

    const { document, report } = patch(doc, [
      makeEdit({
        location: 'Intro',
        originalText: '# 3 Design\nOld design intro.',
        modifiedText: '# 3 Design\nNew design intro.',
      }),
      makeEdit({
        location: 'Vision',
        originalText: '## 3.1 Vision\nOld vision.',
        modifiedText: '## 3.1 Vision\nNew vision.',
      }),
    ]);

    expect(document).toBe('# 3 Design\nNew design intro.\n\n## 3.1 Vision\nNew vision.\n# 4 Next\nKeep.');
    expect(report.applied).toEqual(['Intro', 'Vision']);
    expect(report.skippedDuplicate).toEqual([]);
  });

  it('expands a chapter edit against the text earlier edits left behind', () => {
    const doc = '# 3 A\npara one here.\n\npara two here.\n# 4 B\nx';
    const observer = new RecordingObserver();

    const { document, report } = patch(
      doc,
      [
        makeEdit({ location: 'Para 1', originalText: 'para one here.', modifiedText: 'para ONE here.' }),
        makeEdit({
          location: 'Chapter 3',
          originalText: '# 3 A',
          modifiedText: '# 3 A\nnew body',
          isFullChapter: true,
        }),
      ],
      { observer }
    );

    expect(document).toBe('# 3 A\nnew body\n# 4 B\nx');
    expect(report.applied).toEqual(['Para 1', 'Chapter 3']);
    expect(report.outcomes[1]).toEqual({ index: 1, location: 'Chapter 3', status: 'applied', tier: 'exact' });
    expect(observer.events).toContainEqual({
      type: 'expanded',
      location: 'Chapter 3',
      fromLength: 5,
      toLength: '# 3 A\npara ONE here.\n\npara two here.'.length,
    });
  });

  it('uses the bare heading when expansion fails', () => {
    const observer = new RecordingObserver();
    const { report } = patch(
      '# 1 A\nbody',
      [makeEdit({ originalText: '# 9 Missing', modifiedText: 'x', isFullChapter: true })],
      { observer }
    );

    expect(observer.events[0]).toEqual({ type: 'expansion_failed', location: 'loc', anchorPreview: '# 9 Missing' });
    expect(report.failed).toEqual([{ location: 'loc', reason: 'anchor not found' }]);
  });

  it('does not expand headings of edits not marked as full chapter', () => {
    const { document } = patch('# 1 A\nbody', [makeEdit({ originalText: '# 1 A', modifiedText: '# 1 B' })]);
    expect(document).toBe('# 1 B\nbody');
  });

  it('sweeps duplicate paragraphs unless told not to', () => {
    const doc = 'Same para text.\n\nSame para text.';

    const swept = patch(doc, []);
    expect(swept.document).toBe('Same para text.');
    expect(swept.report.sweptParagraphs).toBe(1);

    const kept = patch(doc, [], { sweep: false });
    expect(kept.document).toBe(doc);
    expect(kept.report.sweptParagraphs).toBe(0);
  });

  it('throws only for a malformed document', () => {
    expect(() => patch('\uD800abc', [])).toThrow(MalformedDocumentError);
    expect(() => assertPatchableDocument(42)).toThrow('Malformed document: expected text, got number');
  });

  it('accepts well-formed surrogate pairs', () => {
    const { document } = patch('emoji 😀 alpha', [makeEdit()]);
    expect(document).toBe('emoji 😀 omega');
  });
});

/* ============= expandHeading ============= */

describe('expandHeading', () => {
  it('is exposed standalone', () => {
    expect(expandHeading('# 3 A\nbody\n# 4 B\nmore', '# 3 A')).toBe('# 3 A\nbody');
  });
});

/* ============= patchMany ============= */

describe('patchMany', () => {
  it('patches independent documents and keeps input order', async () => {
    const results = await patchMany([
      { id: 'a', document: 'alpha beta', edits: [makeEdit()] },
      { id: 'bad', document: '\uDC00', edits: [] },
      { id: 'c', document: 'gamma alpha', edits: [makeEdit()] },
    ]);

    expect(results.map((r) => r.id)).toEqual(['a', 'bad', 'c']);

    const [a, bad, c] = results;
    expect(a.ok && a.document).toBe('omega beta');
    expect(c.ok && c.document).toBe('gamma omega');
    expect(bad.ok).toBe(false);
    if (!bad.ok) {
      expect(bad.error).toBe('Malformed document: contains unpaired surrogate code units');
    }
  });
});
