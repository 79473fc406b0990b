import { InvalidConfigError } from '../common/errors.js';

export interface ChunkingOptions {
  maxSize: number;
  overlap: number;
  /** How far back from the hard cut to look for a paragraph, sentence or word end. */
  lookback: number;
}

export interface TextChunk {
  ordinal: number;
  startOffset: number;
  endOffset: number;
  text: string;
}

const SENTENCE_TERMINATORS = new Set(['.', '!', '?', '。', '！', '？']);
const WHITESPACE = /\s/;

export function validateChunkingOptions(options: ChunkingOptions): void {
  const { maxSize, overlap, lookback } = options;
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new InvalidConfigError(
      `maxSize must be a positive integer, got ${maxSize}`,
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigError(
      `overlap must be a non-negative integer, got ${overlap}`,
    );
  }
  if (overlap >= maxSize) {
    throw new InvalidConfigError(
      `overlap (${overlap}) must be smaller than maxSize (${maxSize})`,
    );
  }
  if (!Number.isInteger(lookback) || lookback < 0) {
    throw new InvalidConfigError(
      `lookback must be a non-negative integer, got ${lookback}`,
    );
  }
}

function isParagraphBoundary(text: string, cut: number): boolean {
  return cut >= 2 && text[cut - 1] === '\n' && text[cut - 2] === '\n';
}

function isSentenceBoundary(text: string, cut: number): boolean {
  const previous = text[cut - 1];
  if (previous === undefined || !SENTENCE_TERMINATORS.has(previous)) {
    return false;
  }
  const next = text[cut];
  return next === undefined || WHITESPACE.test(next);
}

function isWordBoundary(text: string, cut: number): boolean {
  const next = text[cut];
  return next !== undefined && WHITESPACE.test(next);
}

/**
 * Picks where the window `[start, hardEnd)` ends. Paragraph breaks win over
 * sentence ends, sentence ends over word ends; with none of them in the
 * lookback window the cut is `hardEnd`.
 * Cuts at or before `minEnd` are ignored so the next window still advances
 * once the overlap is subtracted.
 */
function findCut(
  text: string,
  hardEnd: number,
  minEnd: number,
  lookback: number,
): number {
  const floor = Math.max(hardEnd - lookback, minEnd + 1);

  for (let cut = hardEnd; cut >= floor; cut--) {
    if (isParagraphBoundary(text, cut)) {
      return cut;
    }
  }
  for (let cut = hardEnd; cut >= floor; cut--) {
    if (isSentenceBoundary(text, cut)) {
      return cut;
    }
  }
  for (let cut = hardEnd; cut >= floor; cut--) {
    if (isWordBoundary(text, cut)) {
      return cut;
    }
  }
  return hardEnd;
}

/**
 * Splits `text` into windows of at most `maxSize` characters. Every window
 * after the first starts exactly `overlap` characters before the previous
 * window's end, so `chunks[0].text + chunks[i].text.slice(overlap)...`
 * reproduces the input. Whitespace-only input yields no chunks.
 */
export function chunkText(text: string, options: ChunkingOptions): TextChunk[] {
  validateChunkingOptions(options);
  const { maxSize, overlap, lookback } = options;

  if (text.trim().length === 0) {
    return [];
  }

  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + maxSize, text.length);
    const end =
      hardEnd === text.length
        ? hardEnd
        : findCut(text, hardEnd, start + overlap, lookback);

    chunks.push({
      ordinal: chunks.length,
      startOffset: start,
      endOffset: end,
      text: text.slice(start, end),
    });

    if (end === text.length) {
      break;
    }
    start = end - overlap;
  }

  return chunks;
}

/**
 * Rebuilds the source text from a contiguous chunk sequence.
 */
export function joinChunks(chunks: readonly TextChunk[], overlap: number): string {
  return chunks
    .map((chunk, index) => (index === 0 ? chunk.text : chunk.text.slice(overlap)))
    .join('');
}
