import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http from 'http';
import { RetrievalClient } from '../../src/client.js';

describe('RetrievalClient connection reuse', () => {
  let server: http.Server;
  let client: RetrievalClient;
  let connections = 0;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      req.resume();
      req.on('end', () => {
        res.writeHead(201, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ ok: true, id: req.url }));
      });
    });
    server.on('connection', () => {
      connections++;
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening');
    }
    client = new RetrievalClient({ apiUrl: `http://127.0.0.1:${address.port}`, projectId: 'pool' });
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
  });

  it('should reuse keep-alive sockets across sequential uploads', async () => {
    const content = new TextEncoder().encode('print("hi")\n');

    for (let i = 0; i < 30; i++) {
      const outcome = await client.uploadDocument({
        content,
        filename: `file-${i}.py`,
        projectId: 'pool',
        metadata: {
          source: `/repo/file-${i}.py`,
          file_type: 'code',
          language: 'python',
          size: content.byteLength,
          last_modified: 0,
          project_id: 'pool',
        },
      });
      expect(outcome).toEqual({ ok: true });
    }

    expect(connections).toBeLessThanOrEqual(2);
  });
});
