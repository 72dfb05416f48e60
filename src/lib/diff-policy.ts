// Rules for differences that are not worth a commit.
//
// A policy looks at the unified patch between the current remote bytes and the
// desired bytes; if any policy calls it spurious the reconciler leaves the
// remote file alone.
import { createTwoFilesPatch } from 'diff';

export type { DiffPolicy };
export { createUnifiedPatch, isSpuriousDiff, pdfTimestampPolicy, DEFAULT_DIFF_POLICIES };

type DiffPolicy = {
  name: string;
  isSpurious(patch: string): boolean;
};

const CONTEXT_LINES = 3;

/**
 * Render a line-oriented unified diff of two byte buffers. Bytes map 1:1 to
 * characters while diffing; the rendered patch must then be valid UTF-8,
 * otherwise the result is the empty string (binary hunks never match a rule).
 */
function createUnifiedPatch(oldBytes: Uint8Array, newBytes: Uint8Array): string {
  let oldText = Buffer.from(oldBytes).toString('latin1');
  let newText = Buffer.from(newBytes).toString('latin1');
  let patch = createTwoFilesPatch('a', 'b', oldText, newText, undefined, undefined, { context: CONTEXT_LINES });
  return decodeUtf8OrEmpty(Buffer.from(patch, 'latin1'));
}

function decodeUtf8OrEmpty(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return '';
  }
}

// PDF rebuilds rewrite /ModDate and /CreationDate in the document info
// dictionary, which always lands in the same hunk.
// NOTE: `-/CreationDate` is checked twice and `+/CreationDate` never; callers
// depend on exactly this rule, so do not "fix" it without migrating them.
const pdfTimestampPolicy: DiffPolicy = {
  name: 'pdf-timestamps',
  isSpurious(patch) {
    return (
      patch.includes('-/ModDate') &&
      patch.includes('-/CreationDate') &&
      patch.includes('+/ModDate') &&
      patch.includes('-/CreationDate') &&
      patch.includes('@@ -5,8 +5,8 @@')
    );
  },
};

const DEFAULT_DIFF_POLICIES: readonly DiffPolicy[] = [pdfTimestampPolicy];

function isSpuriousDiff(
  oldBytes: Uint8Array,
  newBytes: Uint8Array,
  policies: readonly DiffPolicy[] = DEFAULT_DIFF_POLICIES
): boolean {
  if (policies.length === 0) return false;
  let patch = createUnifiedPatch(oldBytes, newBytes);
  return policies.some((policy) => policy.isSpurious(patch));
}
