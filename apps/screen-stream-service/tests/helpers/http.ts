/**
 * Loopback HTTP server and MJPEG client for stream tests
 */
import http, { RequestListener } from 'http';
import { Readable } from 'stream';
import axios from 'axios';
import { waitFor } from './fake-producer.js';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral loopback port
 */
export async function listen(handler: RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));

  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

const PART_HEADER = Buffer.from('--frame\r\nContent-Type: image/jpeg\r\n\r\n');
const PART_END = Buffer.from([0xff, 0xd9, 0x0d, 0x0a]);

/**
 * Split a multipart/x-mixed-replace body into complete JPEG parts
 */
export function parseMjpegParts(raw: Buffer): Buffer[] {
  const parts: Buffer[] = [];
  let offset = 0;

  while (true) {
    const start = raw.indexOf(PART_HEADER, offset);
    if (start === -1) {
      break;
    }
    const bodyStart = start + PART_HEADER.length;
    const end = raw.indexOf(PART_END, bodyStart);
    if (end === -1) {
      break;
    }
    parts.push(raw.subarray(bodyStart, end + 2));
    offset = end + PART_END.length;
  }

  return parts;
}

/**
 * Collects a /stream response
 */
export class MjpegClient {
  private raw: Buffer = Buffer.alloc(0);
  private ended: boolean = false;
  private endedPromise: Promise<void>;

  private constructor(
    readonly status: number,
    readonly headers: Record<string, unknown>,
    private stream: Readable
  ) {
    stream.on('data', (chunk: Buffer) => {
      this.raw = Buffer.concat([this.raw, chunk]);
    });
    this.endedPromise = new Promise<void>((resolve) => {
      const done = (): void => {
        this.ended = true;
        resolve();
      };
      stream.once('end', done);
      stream.once('close', done);
      stream.once('error', done);
    });
  }

  static async connect(url: string): Promise<MjpegClient> {
    const response = await axios.get<Readable>(url, {
      responseType: 'stream',
      validateStatus: () => true,
    });
    return new MjpegClient(response.status, response.headers, response.data);
  }

  getRaw(): Buffer {
    return this.raw;
  }

  parts(): Buffer[] {
    return parseMjpegParts(this.raw);
  }

  async waitForParts(count: number, timeoutMs: number = 2000): Promise<Buffer[]> {
    await waitFor(() => this.parts().length >= count, timeoutMs);
    return this.parts();
  }

  isEnded(): boolean {
    return this.ended;
  }

  /** Resolves when the server ends the response */
  waitForEnd(): Promise<void> {
    return this.endedPromise;
  }

  close(): void {
    this.stream.destroy();
  }
}
