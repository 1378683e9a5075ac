// src/ai/consistencyAnalyzer.ts
// Asks the model which related documents a modification request affects.
// Any failure falls back to "every related document needs the change".

import { composeText, type ComposeOptions } from './modelRouter';
import { isRecord, parseModelJson, stringList } from './jsonOutput';
import { createLogger } from '../observability/logger';

const log = createLogger('ai/consistencyAnalyzer');

export interface ConsistencyAnalysis {
  /** Identifiers (or bare file names) of documents to change */
  needsModification: string[];
  modificationType: string;
  consistencyAnalysis: string;
  globalConsistencyRequired: boolean;
}

const MAX_FILES_IN_PROMPT = 5;
const FILE_PREVIEW_CHARS = 300;
const CURRENT_PREVIEW_CHARS = 500;

export const ANALYZER_SYSTEM_PROMPT = 'You are a document consistency analyst.';

/** Last path segment of a URL or path. */
export function fileNameOf(identifier: string): string {
  const parts = identifier.split(/[\\/]/);
  return parts[parts.length - 1] || identifier;
}

export function buildAnalysisPrompt(
  modificationRequest: string,
  files: ReadonlyMap<string, string>,
  currentContent?: string
): string {
  const summaries = [...files.entries()]
    .slice(0, MAX_FILES_IN_PROMPT)
    .map(([id, content]) => `File: ${fileNameOf(id)}\nPreview: ${content.slice(0, FILE_PREVIEW_CHARS)}...\n`);

  const current = currentContent
    ? `\nCurrent file preview:\n${currentContent.slice(0, CURRENT_PREVIEW_CHARS)}...\n`
    : '';

  return `Analyse how the following modification request affects the documents.

Modification request:
${modificationRequest}
${current}
Related documents:
${summaries.join('\n')}

Answer:
1. Which documents need to change?
2. What kind of change is it (terminology, data update, method change, ...)?
3. Why do these documents need to change?

Reply with JSON only:
{
  "needs_modification": ["file1.md", "file2.md"],
  "modification_type": "terminology | data update | ...",
  "consistency_analysis": "why these documents change",
  "global_consistency_required": true
}`;
}

function fallbackAnalysis(files: ReadonlyMap<string, string>): ConsistencyAnalysis {
  return {
    needsModification: [...files.keys()],
    modificationType: 'consistency update',
    consistencyAnalysis: 'analysis unavailable; all related documents are updated',
    globalConsistencyRequired: true,
  };
}

/** Decode the model's JSON; null when it does not have the expected shape. */
export function decodeAnalysis(reply: string): ConsistencyAnalysis | null {
  const parsed = parseModelJson(reply);
  if (!isRecord(parsed)) return null;

  return {
    needsModification: stringList(parsed.needs_modification),
    modificationType: typeof parsed.modification_type === 'string' ? parsed.modification_type : '',
    consistencyAnalysis:
      typeof parsed.consistency_analysis === 'string' ? parsed.consistency_analysis : '',
    globalConsistencyRequired: parsed.global_consistency_required === true,
  };
}

/**
 * @param files identifier → content of every related document
 */
export async function analyzeConsistency(
  modificationRequest: string,
  files: ReadonlyMap<string, string>,
  currentContent?: string,
  opts: Pick<ComposeOptions, 'provider' | 'model'> = {}
): Promise<ConsistencyAnalysis> {
  if (files.size === 0) {
    return {
      needsModification: [],
      modificationType: 'document update',
      consistencyAnalysis: 'no related documents found',
      globalConsistencyRequired: false,
    };
  }

  const fallback = fallbackAnalysis(files);

  try {
    const result = await composeText(buildAnalysisPrompt(modificationRequest, files, currentContent), {
      ...opts,
      action: 'analyze_consistency',
      systemPrompt: ANALYZER_SYSTEM_PROMPT,
      temperature: 0.3,
      maxTokens: 1000,
      devStub: JSON.stringify({
        needs_modification: fallback.needsModification,
        modification_type: fallback.modificationType,
        consistency_analysis: fallback.consistencyAnalysis,
        global_consistency_required: true,
      }),
    });

    const analysis = decodeAnalysis(result.text);
    if (!analysis) {
      log.warn('analysis reply has an unexpected shape; updating all documents');
      return fallback;
    }
    log.info({ needsModification: analysis.needsModification.length }, 'consistency analysis done');
    return analysis;
  } catch (err) {
    log.error({ err }, 'consistency analysis failed; updating all documents');
    return fallback;
  }
}

