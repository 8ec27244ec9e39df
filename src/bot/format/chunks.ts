/** Kept below Telegram's 4096-character cap to leave headroom. */
export const MESSAGE_CHUNK_LIMIT = 3500;

/**
 * Splits text into ordered chunks of at most `limit` characters. A chunk ends
 * right after the last newline that fits; without one it is cut at `limit`,
 * moved back so an HTML entity or tag is not split. Joining the chunks gives
 * back the input.
 */
export function splitMessage(text: string, limit: number = MESSAGE_CHUNK_LIMIT): string[] {
  if (limit < 1) {
    throw new Error(`Chunk limit must be positive, got ${limit}`);
  }

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const newline = rest.lastIndexOf('\n', limit - 1);
    const end = newline === -1 ? hardCut(rest, limit) : newline + 1;
    chunks.push(rest.slice(0, end));
    rest = rest.slice(end);
  }
  chunks.push(rest);
  return chunks;
}

/** An entity or tag longer than `limit` is still cut at `limit`. */
function hardCut(text: string, limit: number): number {
  const head = text.slice(0, limit);
  let end = limit;
  const amp = head.lastIndexOf('&');
  if (amp > 0 && !head.includes(';', amp)) {
    end = amp;
  }
  const tag = head.lastIndexOf('<');
  if (tag > 0 && !head.includes('>', tag)) {
    end = Math.min(end, tag);
  }
  return end;
}
