import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { HttpTransport } from '../../../src/transport/http-transport.js';
import { resolveEndpointFormat } from '../../../src/transport/endpoint-formats.js';

interface CapturedRequest {
  method: string | undefined;
  url: string | undefined;
  headers: IncomingMessage['headers'];
  body: string;
}

describe('HttpTransport', () => {
  let server: Server;
  let baseUrl: string;
  let captured: CapturedRequest[];
  let handler: (req: IncomingMessage, res: ServerResponse) => void;

  beforeAll(async () => {
    server = createServer((req, res) => {
      let body = '';
      req.on('data', (chunk: Buffer) => {
        body += chunk.toString('utf8');
      });
      req.on('end', () => {
        captured.push({ method: req.method, url: req.url, headers: req.headers, body });
        handler(req, res);
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    captured = [];
    handler = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ choices: [{ message: { content: 'hi' } }] }));
    };
  });

  function transport(path: string, authToken = 'test-secret'): HttpTransport {
    const url = `${baseUrl}${path}`;
    return new HttpTransport({
      settings: { url, authToken, model: 'test-model', maxTokens: 32, temperature: 0.5 },
      format: resolveEndpointFormat('auto', url),
    });
  }

  it('should post the formatted body with bearer auth', async () => {
    const response = await transport('/v1/chat/completions').send(
      { id: 'p-1', text: 'hello', targetTokens: 10 },
      new AbortController().signal
    );

    expect(response.status).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ choices: [{ message: { content: 'hi' } }] });

    expect(captured).toHaveLength(1);
    const [request] = captured;
    expect(request?.method).toBe('POST');
    expect(request?.url).toBe('/v1/chat/completions');
    expect(request?.headers.authorization).toBe('Bearer test-secret');
    expect(request?.headers['content-type']).toBe('application/json');
    expect(JSON.parse(request?.body ?? '')).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'hello' }],
      max_tokens: 32,
      temperature: 0.5,
    });
  });

  it('should omit the Authorization header without a token', async () => {
    await transport('/v1/chat/completions', '').send(
      { id: 'p-1', text: 'hello', targetTokens: 10 },
      new AbortController().signal
    );
    expect(captured[0]?.headers.authorization).toBeUndefined();
  });

  it('should resolve with non-2xx statuses instead of rejecting', async () => {
    handler = (_req, res) => {
      res.writeHead(503);
      res.end('overloaded');
    };

    const response = await transport('/score').send(
      { id: 'p-1', text: 'hello', targetTokens: 10 },
      new AbortController().signal
    );

    expect(response).toEqual({ status: 503, body: 'overloaded' });
  });

  it('should reject when the signal aborts', async () => {
    handler = () => {
      // never answers
    };
    const controller = new AbortController();
    const pending = transport('/v1/chat/completions').send(
      { id: 'p-1', text: 'hello', targetTokens: 10 },
      controller.signal
    );
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toThrow();
  });

  it('should ping with HEAD and accept any status', async () => {
    handler = (_req, res) => {
      res.writeHead(405);
      res.end();
    };

    await expect(transport('/v1/chat/completions').ping(new AbortController().signal)).resolves.toBeUndefined();
    expect(captured[0]?.method).toBe('HEAD');
  });

  it('should reject the ping when nothing listens', async () => {
    const closed = new HttpTransport({
      settings: { url: 'http://127.0.0.1:1/v1/chat/completions', authToken: '', model: 'm', maxTokens: 1, temperature: 0 },
      format: resolveEndpointFormat('openai-chat', 'http://127.0.0.1:1'),
    });

    await expect(closed.ping(new AbortController().signal)).rejects.toThrow();
  });
});
