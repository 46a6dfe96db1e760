import sharp from 'sharp';
import type { GatewayClient } from './client';
import { TransportError } from './errors';

/**
 * In-memory gateway: JSON routes map a path to a parsed body, byte routes to
 * image bytes. Unknown paths fail with a 404 like the real gateway.
 */
export class FakeGatewayClient implements GatewayClient {
  readonly baseUrl = 'https://idr.test';
  readonly requests: string[] = [];

  constructor(
    private json: Record<string, unknown> = {},
    private bytes: Record<string, Buffer> = {},
    private delays: Record<string, number> = {}
  ) {}

  async getJson(path: string): Promise<unknown> {
    await this.wait(path);
    if (!(path in this.json)) {
      throw new TransportError(this.baseUrl + path, { status: 404 });
    }
    return this.json[path];
  }

  async getBytes(path: string): Promise<Buffer> {
    await this.wait(path);
    const body = this.bytes[path];
    if (!body) {
      throw new TransportError(this.baseUrl + path, { status: 404 });
    }
    return body;
  }

  private async wait(path: string) {
    this.requests.push(path);
    const ms = this.delays[path];
    if (ms) await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/** Black square PNG with bright squares at the given top-left corners. */
export async function squaresPng(
  size: number,
  squares: Array<{ row: number; col: number; side: number; value?: number }>
): Promise<Buffer> {
  const data = Buffer.alloc(size * size * 3);
  for (const sq of squares) {
    for (let r = sq.row; r < sq.row + sq.side; r++) {
      for (let c = sq.col; c < sq.col + sq.side; c++) {
        data.fill(sq.value ?? 200, (r * size + c) * 3, (r * size + c) * 3 + 3);
      }
    }
  }
  return sharp(data, { raw: { width: size, height: size, channels: 3 } }).png().toBuffer();
}

export function projectDescription(title: string, experiment: string): string {
  return `Publication Title\n${title}\n\nExperiment Description\n${experiment}`;
}
