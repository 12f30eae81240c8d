/** A slice of a source file; `glue` is what sat between it and the next chunk. */
export type Chunk = { text: string; glue: '\n' | '' };

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Source tokens per request; the rest of the window holds the prompt and the answer. */
export function chunkBudget(contextSize: number): number {
  return Math.max(256, Math.floor(contextSize * 0.4));
}

export function joinChunks(chunks: Chunk[]): string {
  return chunks.map((c, i) => (i === chunks.length - 1 ? c.text : c.text + c.glue)).join('');
}

/**
 * Splits `text` on line boundaries so every chunk fits `maxTokens`.
 * A line longer than the budget on its own is sliced mid-line.
 * `joinChunks(chunkText(t, n)) === t` for every input.
 */
export function chunkText(text: string, maxTokens: number): Chunk[] {
  if (estimateTokens(text) <= maxTokens) return [{ text, glue: '' }];

  const maxChars = maxTokens * 4;
  const chunks: Chunk[] = [];
  let current: string[] = [];
  let currentLength = 0;

  const flush = (glue: Chunk['glue']) => {
    chunks.push({ text: current.join('\n'), glue });
    current = [];
    currentLength = 0;
  };

  for (const line of text.split('\n')) {
    if (current.length && currentLength + 1 + line.length > maxChars) flush('\n');

    if (line.length > maxChars) {
      for (let i = 0; i < line.length; i += maxChars) {
        const piece = line.slice(i, i + maxChars);
        if (i + maxChars < line.length) {
          chunks.push({ text: piece, glue: '' });
        } else {
          current = [piece];
          currentLength = piece.length;
        }
      }
      continue;
    }

    currentLength += current.length ? line.length + 1 : line.length;
    current.push(line);
  }
  flush('');
  return chunks;
}

export type ChunkEdges = { lead: string; core: string; trail: string };

/** Separates the whitespace around a chunk from the text the model should see. */
export function splitEdges(text: string): ChunkEdges {
  const start = text.length - text.trimStart().length;
  const end = text.trimEnd().length;
  if (end <= start) return { lead: text, core: '', trail: '' };
  return { lead: text.slice(0, start), core: text.slice(start, end), trail: text.slice(end) };
}
