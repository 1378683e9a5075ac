// src/ai/editProposer.ts
// Asks the model for a JSON list of edits to one document and decodes it into
// EditRequest[]. The edits are located and applied by src/patching.

import { composeText, type ComposeOptions } from './modelRouter';
import { isRecord, parseModelJson } from './jsonOutput';
import { parseEditRequests } from '../patching/editRequest';
import type { EditRequest } from '../patching/types';
import { createLogger } from '../observability/logger';

const log = createLogger('ai/editProposer');

/* ============= Errors ============= */

export class EditProposalError extends Error {
  constructor(message: string, public readonly fileName: string) {
    super(message);
    this.name = 'EditProposalError';
  }
}

/* ============= Prompt ============= */

export interface ProposeEditsInput {
  modificationRequest: string;
  fileName: string;
  content: string;
  /** An edit already made elsewhere, shown as a style reference */
  referenceModification?: string;
}

const REFERENCE_PREVIEW_CHARS = 500;

export const EDIT_PROPOSER_SYSTEM_PROMPT =
  'You are a meticulous document editor. You locate exactly the passages that must change and rewrite only those.';

export function buildEditPrompt(input: ProposeEditsInput): string {
  const reference = input.referenceModification
    ? `\nReference modification (keep the same style):\n${input.referenceModification.slice(0, REFERENCE_PREVIEW_CHARS)}...\n`
    : '';

  return `Analyse the document below and find every passage that must change.

Modification request:
${input.modificationRequest}
${reference}
File: ${input.fileName}
Content:
${input.content}

Rules:
1. Find all content related to "${input.modificationRequest}".
2. Copy each passage to replace into "original_text" exactly as it appears in the document.
3. Put the rewritten passage into "modified_text", keeping the Markdown formatting.
4. To rewrite a whole chapter, set "original_text" to its heading line and "is_full_chapter" to true.
5. Output only the parts that change, never the whole document.

Reply with JSON only, in this shape:
\`\`\`json
{
  "modifications": [
    {
      "location": "chapter name or position",
      "original_text": "text to replace (verbatim)",
      "modified_text": "replacement text",
      "reason": "why it changes",
      "modification_type": "terminology | data | argument | ...",
      "is_full_chapter": false
    }
  ]
}
\`\`\``;
}

/* ============= Decoding ============= */

/**
 * Decode a model reply into edits. Accepts `{ modifications: [...] }` or a bare
 * array. Entries without string anchors are dropped and logged.
 */
export function decodeEditProposal(reply: string, fileName: string): EditRequest[] {
  let parsed: unknown;
  try {
    parsed = parseModelJson(reply);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new EditProposalError(`Model reply is not valid JSON: ${detail}`, fileName);
  }

  const list = isRecord(parsed) ? parsed.modifications : parsed;
  if (!Array.isArray(list)) {
    throw new EditProposalError('Model reply has no "modifications" list', fileName);
  }

  const { edits, rejected } = parseEditRequests(list);
  if (rejected.length) {
    log.warn({ fileName, rejected }, 'dropped malformed edit entries');
  }
  return edits;
}

/* ============= Entry Point ============= */

export async function proposeEdits(
  input: ProposeEditsInput,
  opts: Pick<ComposeOptions, 'provider' | 'model' | 'seed'> = {}
): Promise<EditRequest[]> {
  log.info({ fileName: input.fileName, chars: input.content.length }, 'requesting edits');

  const result = await composeText(buildEditPrompt(input), {
    ...opts,
    action: 'propose_edits',
    systemPrompt: EDIT_PROPOSER_SYSTEM_PROMPT,
    temperature: 0.3,
    devStub: '{"modifications": []}',
  });

  if (result.finishReason === 'length' || result.finishReason === 'max_tokens') {
    log.warn({ fileName: input.fileName }, 'model reply was truncated');
  }

  const edits = decodeEditProposal(result.text, input.fileName);
  log.info({ fileName: input.fileName, edits: edits.length }, 'edits proposed');
  return edits;
}
