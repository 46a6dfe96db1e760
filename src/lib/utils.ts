/**
 * Shared helpers for the walkthrough: geometry, error formatting,
 * concurrency and SVG escaping.
 */

// ==========================================
// GEOMETRY HELPERS
// ==========================================

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ==========================================
// ERROR HANDLING
// ==========================================

const DEBUG_ERRORS =
  process.env.DEBUG_ERRORS === '1' ||
  process.env.DEBUG_ERRORS === 'true' ||
  process.env.DEBUG_ERRORS === 'yes';

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);

    const code = readField(error, 'code');
    if (code !== undefined) parts.push(`code=${String(code)}`);

    const status = readField(error, 'status') ?? readField(error, 'statusCode');
    if (status !== undefined) parts.push(`status=${String(status)}`);

    const url = readField(error, 'url');
    if (typeof url === 'string') parts.push(`url=${url}`);

    const field = readField(error, 'field');
    if (typeof field === 'string') parts.push(`field=${field}`);

    const filePath = readField(error, 'path');
    if (typeof filePath === 'string') parts.push(`path=${filePath}`);

    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.warn(prefix + formatError(error));
  if (DEBUG_ERRORS && error instanceof Error && error.stack) {
    console.warn(error.stack);
  }
}

// ==========================================
// CONCURRENCY HELPERS
// ==========================================

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the order of `items`; the first rejection rejects the whole run.
 * A non-finite `concurrency` runs one worker.
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function worker() {
    while (true) {
      const i = nextIndex;
      nextIndex += 1;
      if (i >= items.length) return;
      results[i] = await fn(items[i], i);
    }
  }

  // NaN, fractions and values below 1 fall back to whole workers, at least one.
  const limit = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

// ==========================================
// XML/SVG HELPERS
// ==========================================

export function escapeXml(text: string): string {
  return String(text)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
