/**
 * Groups whitespace-separated words into chunks of at most `chunkSize`
 * characters, counting one separating space per word. A word longer than
 * `chunkSize` becomes a chunk of its own.
 */
export function chunkText(text: string, chunkSize: number): string[] {
  if (chunkSize <= 0) {
    throw new RangeError("chunkSize must be positive");
  }

  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const chunks: string[] = [];
  let current: string[] = [];
  let currentSize = 0;

  for (const word of words) {
    const wordSize = word.length + 1;
    if (current.length > 0 && currentSize + wordSize > chunkSize) {
      chunks.push(current.join(" "));
      current = [word];
      currentSize = wordSize;
    } else {
      current.push(word);
      currentSize += wordSize;
    }
  }

  if (current.length > 0) {
    chunks.push(current.join(" "));
  }

  return chunks;
}
