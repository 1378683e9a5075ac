// scripts/patch_file.ts
// Purpose: Apply a JSON list of edits to a Markdown file on disk and print the
// per-edit report on stderr. Edits use the wire format (original_text, modified_text, ...).
// Usage:
//   npx tsx scripts/patch_file.ts --doc=chapter.md --edits=edits.json
//   npx tsx scripts/patch_file.ts --doc=chapter.md --edits=edits.json --out=chapter.patched.md
//   npx tsx scripts/patch_file.ts --doc=chapter.md --edits=edits.json --no-sweep --verbose

import { promises as fs } from 'node:fs';
import {
  createLoggingObserver,
  parseEditRequests,
  patch,
  silentObserver,
  summarizePatch,
} from '../src/patching';
import { createLogger } from '../src/observability/logger';

type Flags = { doc?: string; edits?: string; out?: string; sweep: boolean; verbose: boolean };
export function parseFlags(argv: string[]): Flags {
  const f: Flags = { sweep: true, verbose: false };
  for (const a of argv.slice(2)) {
    if (a.startsWith('--doc=')) f.doc = a.slice('--doc='.length);
    else if (a.startsWith('--edits=')) f.edits = a.slice('--edits='.length);
    else if (a.startsWith('--out=')) f.out = a.slice('--out='.length);
    else if (a === '--no-sweep') f.sweep = false;
    else if (a === '--verbose' || a === '-v') f.verbose = true;
  }
  return f;
}

/** Accepts a bare list or the model's `{ "modifications": [...] }` envelope. */
function editList(raw: unknown): unknown {
  if (raw && typeof raw === 'object' && !Array.isArray(raw) && 'modifications' in raw) {
    return raw.modifications;
  }
  return raw;
}

async function main() {
  const { doc, edits: editsPath, out, sweep, verbose } = parseFlags(process.argv);
  if (!doc || !editsPath) {
    console.error('usage: patch_file.ts --doc=<file.md> --edits=<edits.json> [--out=<file.md>] [--no-sweep] [--verbose]');
    process.exit(2);
  }

  const document = await fs.readFile(doc, 'utf8');
  const raw: unknown = JSON.parse(await fs.readFile(editsPath, 'utf8'));
  const { edits, rejected } = parseEditRequests(editList(raw));
  if (rejected.length) {
    console.error(`skipping malformed edits at positions: ${rejected.join(', ')}`);
  }

  const observer = verbose ? createLoggingObserver(createLogger('cli')) : silentObserver;
  const result = patch(document, edits, { sweep, observer });

  for (const o of result.report.outcomes) {
    const tier = o.tier ? `  [${o.tier}]` : '';
    const reason = o.reason ? `  (${o.reason})` : '';
    console.error(`${o.status.toUpperCase().padEnd(18)}${o.location}${tier}${reason}`);
  }

  if (out) {
    await fs.writeFile(out, result.document, 'utf8');
  } else if (!verbose) {
    process.stdout.write(result.document);
  }

  const summary = summarizePatch(document, result.document);
  console.error(JSON.stringify({
    total: edits.length,
    applied: result.report.applied.length,
    failed: result.report.failed.length,
    lowConfidence: result.report.lowConfidence.length,
    sweptParagraphs: result.report.sweptParagraphs,
    lines: summary.text,
  }, null, 2));
}

if (require.main === module) {
  main().catch(err => { console.error(err); process.exit(1); });
}
