import { ProtocolCallError, ProtocolClient, parseFirstEvent } from '../../../src/protocol/client.js';
import { HarnessErrorCode } from '../../../src/shared/errors.js';
import { STUB_TOOLS, startStubService } from '../../fixtures/stub-service.js';
import type { StubOptions, StubService } from '../../fixtures/stub-service.js';
import { MemoryLog } from '../../fixtures/request-log.js';

describe('ProtocolClient', () => {
  let stub: StubService;
  let log: MemoryLog;

  async function clientFor(options?: StubOptions): Promise<ProtocolClient> {
    stub = await startStubService(options);
    return new ProtocolClient(stub.baseUrl, log, { timeoutMs: 2000, streamReadMs: 1000 });
  }

  beforeEach(() => {
    log = new MemoryLog();
  });

  afterEach(async () => {
    await stub.close();
  });

  it('lists every tool the service exposes', async () => {
    const client = await clientFor();
    expect(await client.toolNames()).toEqual(STUB_TOOLS);
  });

  it('gives each request a fresh id', async () => {
    const client = await clientFor();
    await client.initialize();
    await client.listTools();

    const ids = stub.requests.map(r => JSON.parse(r.body).id);
    expect(ids).toEqual([1, 2]);
    expect(log.lines[0]).toMatch(/^RPC -> \{"jsonrpc":"2\.0","id":1,"method":"initialize"/);
  });

  it('returns tool text and raises tool-level errors', async () => {
    const client = await clientFor();
    expect(await client.callToolText('search', { query: 'add' })).toBe('called search');
    await expect(client.callToolText('broken_tool')).rejects.toMatchObject({ code: HarnessErrorCode.PROTOCOL_ERROR });
  });

  it('raises the JSON-RPC error object as ProtocolCallError', async () => {
    const client = await clientFor();
    const err = await client.call('no/such/method').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProtocolCallError);
    expect(err).toMatchObject({ rpcCode: -32601, rpcMessage: 'Method not found: no/such/method' });
  });

  it('treats a response with neither result nor error as a violation', async () => {
    const client = await clientFor();
    await expect(client.call('test/no-result')).rejects.toMatchObject({ code: HarnessErrorCode.PROTOCOL_VIOLATION });
  });

  it('rejects a response whose id does not match', async () => {
    const client = await clientFor();
    await expect(client.call('test/wrong-id')).rejects.toThrow('response id 101 does not match request id 1');
  });

  describe('probeEventStream', () => {
    it('accepts an endpoint event with an http URL', async () => {
      const client = await clientFor();
      const event = await client.probeEventStream();
      expect(event.event).toBe('endpoint');
      expect(event.data).toBe(`http://127.0.0.1:${stub.port}/mcp/v1?session=1`);
    });

    it('rejects a first event that is not the endpoint', async () => {
      const client = await clientFor({ sseEvent: 'message', sseData: '{}' });
      await expect(client.probeEventStream()).rejects.toMatchObject({ code: HarnessErrorCode.PROTOCOL_VIOLATION });
    });

    it('rejects endpoint data that is not a URL', async () => {
      const client = await clientFor({ sseData: '/mcp/v1' });
      await expect(client.probeEventStream()).rejects.toMatchObject({ code: HarnessErrorCode.PROTOCOL_VIOLATION });
    });
  });
});

describe('parseFirstEvent', () => {
  it('defaults the event name and joins data lines', () => {
    expect(parseFirstEvent(': comment\ndata: a\ndata: b\n\nevent: later\n')).toEqual({
      event: 'message',
      data: 'a\nb',
      raw: ': comment\ndata: a\ndata: b\n\nevent: later\n',
    });
  });

  it('handles CRLF line endings', () => {
    expect(parseFirstEvent('event: endpoint\r\ndata: http://x/mcp\r\n\r\n').event).toBe('endpoint');
  });
});
