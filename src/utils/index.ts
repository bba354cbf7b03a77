export interface Batch<T> {
  index: number;
  total: number;
  items: T[];
}

/**
 * Split `items` into contiguous slices of at most `size`, in order. Pacing is
 * left to the caller.
 */
export function* batches<T>(items: readonly T[], size: number): Generator<Batch<T>> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const total = Math.ceil(items.length / size);
  for (let index = 0; index < total; index++) {
    yield {
      index,
      total,
      items: items.slice(index * size, (index + 1) * size),
    };
  }
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

// setTimeout fires almost at once for delays above this
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

async function sleepFor(ms: number): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMEOUT_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  }
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: sleepFor,
};

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function truncate(text: string, max: number = 70): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
