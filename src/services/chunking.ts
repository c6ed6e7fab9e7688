// src/services/chunking.ts
// What: Overlapping, boundary-aware chunking of normalized course documents.
// How: Walks the text greedily. Each window ends at the latest paragraph break that fits, else the latest
//      line break, sentence end, word gap, and finally a hard cut at maxSize. The next window starts
//      `overlap` characters before the previous end, so adjacent chunks share exactly `overlap` chars.
//      Offsets that would split a surrogate pair move by one code unit, so no chunk holds half a character.

import { ConfigError } from '../errors.js';
import type { Chunk, NormalizedDocument } from '../models/types.js';

export interface ChunkOptions {
  maxSize: number;
  overlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = { maxSize: 500, overlap: 50 };

// Tried in order; a match's end offset is a candidate chunk end.
const BREAK_PATTERNS: RegExp[] = [
  /\n[ \t]*\n+/g, // paragraph
  /\n/g, // line
  /[.!?]+\s+/g, // sentence
  /\s+/g, // word
];

export function assertChunkOptions({ maxSize, overlap }: ChunkOptions): void {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new ConfigError(`Chunk size must be a positive integer, got ${maxSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigError(`Chunk overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= maxSize) {
    throw new ConfigError(`Chunk overlap (${overlap}) must be smaller than chunk size (${maxSize})`);
  }
}

export function splitText(text: string, options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): string[] {
  assertChunkOptions(options);
  const { maxSize, overlap } = options;
  if (text.length === 0) return [];

  const pieces: string[] = [];
  let start = 0;
  while (text.length - start > maxSize) {
    // end must leave the next window starting after `start`
    const minEnd = start + overlap + 1;
    let end = findBreak(text, start, minEnd, start + maxSize);
    if (splitsSurrogatePair(text, end)) end += end - 1 >= minEnd ? -1 : 1;
    pieces.push(text.slice(start, end));

    let next = end - overlap;
    if (splitsSurrogatePair(text, next)) next += next - 1 > start ? -1 : 1;
    start = next;
  }
  pieces.push(text.slice(start));
  return pieces;
}

function splitsSurrogatePair(text: string, offset: number): boolean {
  if (offset <= 0 || offset >= text.length) return false;
  const before = text.charCodeAt(offset - 1);
  const after = text.charCodeAt(offset);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

function findBreak(text: string, windowStart: number, minEnd: number, maxEnd: number): number {
  const window = text.slice(windowStart, maxEnd);
  for (const pattern of BREAK_PATTERNS) {
    let best = -1;
    for (const m of window.matchAll(pattern)) {
      const end = windowStart + (m.index ?? 0) + m[0].length;
      if (end >= minEnd) best = end;
    }
    if (best !== -1) return best;
  }
  return maxEnd;
}

export function chunkDocument(doc: NormalizedDocument, options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): Chunk[] {
  const sourceDocumentId = doc.metadata.url;
  return splitText(doc.text, options).map((text, index) => ({
    id: `${sourceDocumentId}#${index}`,
    text,
    metadata: { ...doc.metadata },
    sourceDocumentId,
    index,
  }));
}

export function chunkDocuments(docs: NormalizedDocument[], options: ChunkOptions = DEFAULT_CHUNK_OPTIONS): Chunk[] {
  assertChunkOptions(options);
  return docs.flatMap((doc) => chunkDocument(doc, options));
}
