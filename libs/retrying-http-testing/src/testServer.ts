import { createServer, type IncomingMessage, type Server } from 'node:http';
import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';

export const JSON_CONTENT_TYPE = 'application/json';
export const FORM_ENCODED_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/** What the server echoes back for every call. */
export const recordedCallSchema = z.object({
  method: z.string(),
  callCount: z.number().int(),
  body: z.string(),
  headers: z.record(z.union([z.string(), z.array(z.string())])),
  path: z.string(),
  error: z.string(),
});

export type RecordedCall = z.infer<typeof recordedCallSchema>;

export async function readRecordedCall(response: Response): Promise<RecordedCall> {
  return recordedCallSchema.parse(JSON.parse(await response.text()));
}

/**
 * JSON request bodies of this shape make the server hold its response for
 * `delayMs` when it is handling call number `delayOnCall`.
 */
export const delayInstructionSchema = z.object({
  delayMs: z.number().int().nonnegative().optional(),
  delayOnCall: z.number().int().positive().optional(),
});

export type DelayInstruction = z.infer<typeof delayInstructionSchema>;

export function delayInstruction(delayOnCall: number, delayMs = 1000): string {
  return JSON.stringify({ delayMs, delayOnCall } satisfies DelayInstruction);
}

export interface TestServer {
  readonly url: string;
  /** Calls received so far, including ones still being handled. */
  readonly callCount: number;
  close(): Promise<void>;
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf8');
}

function parseDelay(contentType: string | undefined, body: string): DelayInstruction | Error {
  if (contentType !== JSON_CONTENT_TYPE) return {};
  try {
    const parsed = delayInstructionSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data : new Error(parsed.error.message);
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Starts an HTTP server on 127.0.0.1 that answers every call with
 * `statusCode` and a JSON {@link RecordedCall} describing what it received.
 *
 * @example
 * ```typescript
 * const server = await startTestServer(500);
 * await client.get({}, server.url);
 * expect(server.callCount).toBe(4);
 * await server.close();
 * ```
 */
export async function startTestServer(statusCode: number): Promise<TestServer> {
  let callCount = 0;

  const server: Server = createServer((req, res) => {
    callCount += 1;
    const thisCall = callCount;

    const handle = async () => {
      const body = await readBody(req);
      const contentType = req.headers['content-type'];
      const headers: Record<string, string | string[]> = {};
      for (const [key, value] of Object.entries(req.headers)) {
        if (value !== undefined) headers[key] = value;
      }

      const instruction = parseDelay(contentType, body);
      if (!(instruction instanceof Error) && instruction.delayMs !== undefined && instruction.delayOnCall === thisCall) {
        await delay(instruction.delayMs);
      }

      const record: RecordedCall = {
        method: req.method ?? '',
        callCount: thisCall,
        body,
        headers,
        path: new URL(req.url ?? '/', 'http://127.0.0.1').pathname,
        error: instruction instanceof Error ? instruction.message : '',
      };

      if (res.destroyed) return;
      res.writeHead(statusCode, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end(JSON.stringify(record));
    };

    handle().catch((error: unknown) => {
      if (!res.headersSent) {
        res.writeHead(statusCode, { 'Content-Type': 'text/plain; charset=utf-8' });
      }
      res.end(error instanceof Error ? error.message : String(error));
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    get callCount() {
      return callCount;
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
