/**
 * Capstack Memory Module — Chunker
 *
 * Splits text into overlapping token windows.
 *
 * A token is a run of non-whitespace plus the whitespace that follows it,
 * so a window's text is the exact concatenation of its tokens. Window `k`
 * starts its new content at token `k * chunkSize` and also carries the
 * `overlap` tokens before that:
 *
 *   window k = tokens [max(0, k*chunkSize - overlap), min(n, (k+1)*chunkSize))
 *
 * 1000 tokens at 512/64 → [0, 512) and [448, 1000).
 */

const TOKEN = /\S+\s*/g;

export interface TextWindow {
  readonly content: string;
  readonly token_count: number;
  /** First token index, inclusive. */
  readonly start: number;
  /** Last token index, exclusive. */
  readonly end: number;
}

export function tokenize(text: string): string[] {
  return text.match(TOKEN) ?? [];
}

/**
 * @param chunkSize - new tokens per window; must be > 0
 * @param overlap - tokens carried from the previous window; 0 ≤ overlap < chunkSize
 */
export function chunkText(text: string, chunkSize: number, overlap: number): TextWindow[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(`overlap must be an integer in [0, ${chunkSize}), got ${overlap}`);
  }

  const tokens = tokenize(text);
  const windows: TextWindow[] = [];
  for (let from = 0; from < tokens.length; from += chunkSize) {
    const start = Math.max(0, from - overlap);
    const end = Math.min(tokens.length, from + chunkSize);
    windows.push({
      content: tokens.slice(start, end).join(''),
      token_count: end - start,
      start,
      end,
    });
  }
  return windows;
}
