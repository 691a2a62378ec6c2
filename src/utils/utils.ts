export function nowMs(): number {
  return Date.now();
}

/** Current unix time in seconds, the unit of `created_at`. */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Split an array into consecutive chunks of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
