import { z } from 'zod';
import { HttpTestClient, healthStatus, probeHealth } from '../../../src/http/client.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';
import { startStubService } from '../../fixtures/stub-service.js';
import type { StubService } from '../../fixtures/stub-service.js';
import { MemoryLog } from '../../fixtures/request-log.js';

describe('HttpTestClient', () => {
  let stub: StubService;
  let log: MemoryLog;
  let client: HttpTestClient;

  beforeEach(async () => {
    stub = await startStubService();
    log = new MemoryLog();
    client = new HttpTestClient(stub.baseUrl, log, { timeoutMs: 2000 });
  });

  afterEach(async () => {
    await stub.close();
  });

  it('returns status, headers and body, and logs both directions', async () => {
    const result = await client.get('/health');

    expect(result.status).toBe(200);
    expect(result.headers['content-type']).toBe('application/json');
    expect(result.json()).toEqual({ status: 'ok' });
    expect(log.lines).toEqual(['GET /health', 'Response: 200 {"status":"ok"}']);
  });

  it('sends JSON bodies with a content type', async () => {
    const result = await client.post('/projects', { name: 'demo', path: '/work/demo' });

    expect(result.status).toBe(201);
    expect(stub.requests[0]).toEqual({ method: 'POST', url: '/projects', body: '{"name":"demo","path":"/work/demo"}' });
    expect(log.lines[0]).toBe('POST /projects {"name":"demo","path":"/work/demo"}');
  });

  it('validates JSON with a schema', async () => {
    const { data } = await client.getJson('/health', z.object({ status: z.literal('ok') }));
    expect(data.status).toBe('ok');
  });

  it('fails getHTML on a non-200 page', async () => {
    expect(await client.getHTML('/web/')).toContain('<h1>Projects</h1>');
    await expect(client.getHTML('/web/missing')).rejects.toMatchObject({ code: HarnessErrorCode.REQUEST_FAILED });
  });

  it('reports a timeout distinctly from a refusal', async () => {
    const slow = new HttpTestClient(stub.baseUrl, log, { timeoutMs: 100 });
    await expect(slow.get('/slow')).rejects.toMatchObject({ code: HarnessErrorCode.REQUEST_TIMEOUT });
    expect(log.lines[log.lines.length - 1]).toMatch(/^Error: GET \/slow: /);
  });

  it('reports a refused connection as REQUEST_FAILED', async () => {
    const port = stub.port;
    await stub.close();
    stub = await startStubService();
    const refused = new HttpTestClient(`http://127.0.0.1:${port}`, log, { timeoutMs: 1000 });
    await expect(refused.get('/health')).rejects.toMatchObject({ code: HarnessErrorCode.REQUEST_FAILED });
  });

  it('raises PROTOCOL_VIOLATION when the body is not JSON', async () => {
    const result = await client.get('/web/');
    expect(() => result.json()).toThrow(expect.objectContaining({ code: HarnessErrorCode.PROTOCOL_VIOLATION }));
  });
});

describe('probeHealth', () => {
  it('is true for HTTP 200 and names any other status in its error', async () => {
    const healthy = await startStubService();
    const unhealthy = await startStubService({ healthStatus: 503 });
    try {
      expect(await probeHealth(healthy.baseUrl, '/health', 1000)).toBe(true);
      await expect(probeHealth(unhealthy.baseUrl, '/health', 1000)).rejects.toMatchObject({
        code: HarnessErrorCode.REQUEST_FAILED,
        message: `GET ${unhealthy.baseUrl}/health: HTTP 503`,
        context: { status: 503 },
      });
      expect(await healthStatus(unhealthy.baseUrl, '/health', 1000)).toBe(503);
    } finally {
      await healthy.close();
      await unhealthy.close();
    }
  });
});
