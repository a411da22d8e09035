/**
 * Message Splitter
 *
 * Cuts long text into ordered chunks no longer than `maxLength` whose
 * concatenation is exactly the input. Fenced code blocks are kept whole
 * unless a block by itself is longer than a chunk.
 */

const SEPARATORS = ["\n\n", "\n", ". ", " "] as const;

const FENCE = "```";

interface FenceRange {
  start: number;
  end: number;
}

/** Fence ranges over the whole text, in absolute offsets. */
function findFences(text: string): FenceRange[] {
  const ranges: FenceRange[] = [];
  let open = text.indexOf(FENCE);

  while (open !== -1) {
    const close = text.indexOf(FENCE, open + FENCE.length);
    if (close === -1) {
      ranges.push({ start: open, end: text.length });
      break;
    }
    const end = close + FENCE.length;
    ranges.push({ start: open, end });
    open = text.indexOf(FENCE, end);
  }

  return ranges;
}

function insideFence(fences: FenceRange[], position: number): boolean {
  return fences.some((f) => position > f.start && position < f.end);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Absolute index at which to end the chunk starting at `start`. Separator
 * cuts must land past half the chunk so chunks stay reasonably full.
 */
function chooseCut(text: string, fences: FenceRange[], start: number, maxLength: number): number {
  const limit = start + maxLength;
  const half = Math.floor(maxLength / 2);

  for (const sep of SEPARATORS) {
    let idx = text.lastIndexOf(sep, limit - sep.length);
    while (idx > start) {
      const cut = idx + sep.length;
      if (cut - start <= half) break;
      if (!insideFence(fences, cut)) return cut;
      idx = text.lastIndexOf(sep, idx - 1);
    }
  }

  const straddling = fences.find((f) => f.start < limit && f.end > limit);
  if (straddling && straddling.start > start) {
    return straddling.start;
  }

  // never leave half of a surrogate pair on either side
  return isHighSurrogate(text.charCodeAt(limit - 1)) ? limit - 1 : limit;
}

export function splitMessage(content: string, maxLength: number): string[] {
  if (!Number.isInteger(maxLength) || maxLength < 8) {
    throw new Error(`splitMessage maxLength must be an integer >= 8, got ${maxLength}`);
  }
  if (content.length <= maxLength) {
    return [content];
  }

  const fences = findFences(content);
  const chunks: string[] = [];
  let position = 0;

  while (content.length - position > maxLength) {
    const cut = chooseCut(content, fences, position, maxLength);
    chunks.push(content.slice(position, cut));
    position = cut;
  }

  if (position < content.length) {
    chunks.push(content.slice(position));
  }

  return chunks;
}

export function withPartHeaders(chunks: string[]): string[] {
  if (chunks.length <= 1) return chunks;
  return chunks.map((chunk, i) => `[Part ${i + 1}/${chunks.length}]\n${chunk}`);
}
