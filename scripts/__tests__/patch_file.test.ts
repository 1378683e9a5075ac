import { describe, it, expect } from 'vitest';
import { parseFlags } from '../patch_file';

const argv = (...args: string[]) => ['node', 'patch_file.ts', ...args];

describe('parseFlags', () => {
  it('defaults to sweeping quietly', () => {
    expect(parseFlags(argv())).toEqual({ sweep: true, verbose: false });
  });

  it('reads paths and switches', () => {
    expect(parseFlags(argv('--doc=chapter.md', '--edits=edits.json', '--out=out.md', '--no-sweep', '-v'))).toEqual({
      doc: 'chapter.md',
      edits: 'edits.json',
      out: 'out.md',
      sweep: false,
      verbose: true,
    });
  });

  it('ignores unknown arguments', () => {
    expect(parseFlags(argv('--doc=a.md', '--dry-run', 'extra'))).toEqual({ doc: 'a.md', sweep: true, verbose: false });
  });
});
