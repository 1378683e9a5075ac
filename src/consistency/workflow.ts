// src/consistency/workflow.ts
// Consistency check across documents:
//   1. load the target document, if one is named
//   2. find and load related documents through the retrieval index
//   3. ask the model which documents the request affects
//   4. ask the model for edits to every loaded document and patch them
//
// A document whose proposal or patch fails keeps its original content and says
// why in its diffSummary; the run as a whole still succeeds.

import type { Logger } from "pino";
import { analyzeConsistency, fileNameOf, type ConsistencyAnalysis } from "../ai/consistencyAnalyzer";
import { proposeEdits } from "../ai/editProposer";
import { findRelatedDocuments, type RelatedDocuments } from "../retrieval/relatedDocuments";
import { fetchDocument } from "../storage/documentFetcher";
import {
  combineObservers,
  createLoggingObserver,
  patchMany,
  summarizePatch,
  type EditRequest,
  type PatchJob,
  type PatchReport,
} from "../patching";
import { createMetricsObserver } from "../observability/metrics";
import { createLogger } from "../observability/logger";
import { config } from "../config";

/* ============= Types ============= */

export interface ConsistencyCheckRequest {
  /** Retrieval query: the concept being changed */
  modificationPoint: string;
  /** What to change, in words */
  modificationRequest: string;
  projectId: string;
  topK: number;
  /** Document to modify first; excluded from retrieval results */
  targetFile?: string;
  includeRelated: boolean;
}

export interface FileModification {
  filePath: string;
  originalContent: string;
  modifiedContent: string;
  diffSummary: string;
  originalLength: number;
  modifiedLength: number;
  /** Edits are applied as patches, never by regenerating the document */
  truncated: false;
  report?: PatchReport;
  error?: string;
}

export interface ConsistencyCheckResponse {
  success: boolean;
  modificationPoint: string;
  consistencyAnalysis: ConsistencyAnalysis | Record<string, never>;
  relatedFiles: RelatedDocuments["relatedFiles"];
  totalFiles: number;
  totalChunks: number;
  modifications: FileModification[];
  message: string;
}

export interface WorkflowOptions {
  log?: Logger;
}

const defaultLog = createLogger("consistency/workflow");

/* ============= Loading ============= */

async function loadDocument(identifier: string, log: Logger): Promise<string | null> {
  try {
    const content = await fetchDocument(identifier);
    if (!content) {
      log.warn({ identifier }, "document is empty; skipping");
      return null;
    }
    return content;
  } catch (err) {
    log.warn({ err, identifier }, "could not load document; skipping");
    return null;
  }
}

/* ============= Modification ============= */

type Proposal =
  | { filePath: string; content: string; edits: EditRequest[] }
  | { filePath: string; content: string; error: string };

function unchanged(filePath: string, content: string, diffSummary: string, error?: string): FileModification {
  return {
    filePath,
    originalContent: content,
    modifiedContent: content,
    diffSummary,
    originalLength: content.length,
    modifiedLength: content.length,
    truncated: false,
    ...(error ? { error } : {}),
  };
}

function describeReport(report: PatchReport, total: number, before: string, after: string): string {
  const failed = report.failed.length ? `, ${report.failed.length} failed` : "";
  return `applied ${report.applied.length} of ${total} edits${failed}; ${summarizePatch(before, after).text}`;
}

async function modifyDocuments(
  modificationRequest: string,
  files: ReadonlyMap<string, string>,
  log: Logger
): Promise<FileModification[]> {
  const proposals = await Promise.all(
    [...files.entries()].map(async ([filePath, content]): Promise<Proposal> => {
      try {
        const edits = await proposeEdits({ modificationRequest, fileName: fileNameOf(filePath), content });
        return { filePath, content, edits };
      } catch (err) {
        return { filePath, content, error: err instanceof Error ? err.message : String(err) };
      }
    })
  );

  const jobs: PatchJob[] = [];
  for (const p of proposals) {
    if ("edits" in p && p.edits.length) {
      jobs.push({ id: p.filePath, document: p.content, edits: p.edits });
    }
  }

  const observer = combineObservers(createLoggingObserver(log), createMetricsObserver());
  const results = await patchMany(jobs, { observer, sweep: config.patch.sweepDuplicates });
  const byId = new Map(results.map((r) => [r.id, r]));

  return proposals.map((p): FileModification => {
    if ("error" in p) {
      log.error({ filePath: p.filePath, error: p.error }, "edit proposal failed");
      return unchanged(p.filePath, p.content, `modification failed: ${p.error}`, p.error);
    }
    if (!p.edits.length) {
      return unchanged(p.filePath, p.content, "no changes needed");
    }

    const result = byId.get(p.filePath);
    if (!result || !result.ok) {
      const error = result && !result.ok ? result.error : "patch did not run";
      return unchanged(p.filePath, p.content, `modification failed: ${error}`, error);
    }

    return {
      filePath: p.filePath,
      originalContent: p.content,
      modifiedContent: result.document,
      diffSummary: describeReport(result.report, p.edits.length, p.content, result.document),
      originalLength: p.content.length,
      modifiedLength: result.document.length,
      truncated: false,
      report: result.report,
    };
  });
}

/* ============= Entry Point ============= */

export async function runConsistencyCheck(
  request: ConsistencyCheckRequest,
  opts: WorkflowOptions = {}
): Promise<ConsistencyCheckResponse> {
  const log = opts.log ?? defaultLog;
  log.info(
    {
      modificationPoint: request.modificationPoint,
      projectId: request.projectId,
      topK: request.topK,
      targetFile: request.targetFile,
      includeRelated: request.includeRelated,
    },
    "consistency check started"
  );

  try {
    const files = new Map<string, string>();
    let related: RelatedDocuments = { relatedFiles: {}, totalFiles: 0, totalChunks: 0 };

    if (request.targetFile) {
      const content = await loadDocument(request.targetFile, log);
      if (content !== null) files.set(request.targetFile, content);
    }

    if (request.includeRelated) {
      related = await findRelatedDocuments(request.modificationPoint, request.projectId, {
        topK: request.topK,
        currentFile: request.targetFile,
      });

      const ids = Object.keys(related.relatedFiles).filter((id) => !files.has(id));
      const contents = await Promise.all(ids.map((id) => loadDocument(id, log)));
      ids.forEach((id, i) => {
        const content = contents[i];
        if (content !== null) files.set(id, content);
      });
    }

    const base = {
      success: true,
      modificationPoint: request.modificationPoint,
      relatedFiles: related.relatedFiles,
      totalFiles: related.totalFiles,
      totalChunks: related.totalChunks,
    };

    if (files.size === 0) {
      log.info("no documents to modify");
      return { ...base, consistencyAnalysis: {}, modifications: [], message: "no documents to modify" };
    }

    const analysis = await analyzeConsistency(request.modificationRequest, files);
    const modifications = await modifyDocuments(request.modificationRequest, files, log);

    log.info({ documents: files.size, modifications: modifications.length }, "consistency check finished");
    return {
      ...base,
      consistencyAnalysis: analysis,
      modifications,
      message: `analysed ${files.size} documents, produced ${modifications.length} modifications`,
    };
  } catch (err) {
    log.error({ err }, "consistency check failed");
    return {
      success: false,
      modificationPoint: request.modificationPoint,
      consistencyAnalysis: {},
      relatedFiles: {},
      totalFiles: 0,
      totalChunks: 0,
      modifications: [],
      message: `check failed: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
}
