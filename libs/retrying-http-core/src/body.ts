import type { ReplayableBody } from './types';

export type ReplayableBodyInit = string | Uint8Array | ArrayBuffer | URLSearchParams;

const encoder = new TextEncoder();

function toBytes(data: ReplayableBodyInit): Uint8Array {
  if (typeof data === 'string') return encoder.encode(data);
  if (data instanceof URLSearchParams) return encoder.encode(data.toString());
  if (data instanceof Uint8Array) return data;
  return new Uint8Array(data);
}

/**
 * Buffers `data` once and hands out an independent stream over the same bytes
 * on every `open()`.
 */
export function replayableBody(data: ReplayableBodyInit): ReplayableBody {
  const bytes = toBytes(data).slice();
  return {
    contentLength: bytes.byteLength,
    open: () =>
      new ReadableStream<Uint8Array>({
        start(controller) {
          if (bytes.byteLength > 0) {
            controller.enqueue(bytes.slice());
          }
          controller.close();
        },
      }),
  };
}

/**
 * Wraps a factory that produces a new stream for each attempt. The factory
 * must yield the same bytes every time it is called.
 */
export function bodyFromFactory(factory: () => ReadableStream<Uint8Array>, contentLength = -1): ReplayableBody {
  return { contentLength, open: factory };
}

export function isReplayableBody(value: unknown): value is ReplayableBody {
  return (
    typeof value === 'object' &&
    value !== null &&
    'open' in value &&
    typeof value.open === 'function' &&
    'contentLength' in value &&
    typeof value.contentLength === 'number'
  );
}

/**
 * Drains a fresh copy of the body into a buffer of its own. Aborting `signal`
 * cancels the stream and rejects with the abort reason.
 */
export async function readReplayableBody(body: ReplayableBody, signal?: AbortSignal): Promise<ArrayBuffer> {
  signal?.throwIfAborted();
  const reader = body.open().getReader();
  const onAbort = () => {
    // The read fails with the abort reason; a failing cancel adds nothing to it.
    reader.cancel(signal?.reason).catch(() => undefined);
  };
  signal?.addEventListener('abort', onAbort, { once: true });

  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      signal?.throwIfAborted();
      if (done) break;
      chunks.push(value);
      total += value.byteLength;
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
    reader.releaseLock();
  }

  const buffer = new ArrayBuffer(total);
  const view = new Uint8Array(buffer);
  let offset = 0;
  for (const chunk of chunks) {
    view.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return buffer;
}
