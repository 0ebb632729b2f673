import {
  CallToolResultSchema,
  InitializeResultSchema,
  LATEST_PROTOCOL_VERSION,
  ListToolsResultSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, InitializeResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { isPlainObject } from '../shared/objects.js';
import { parseJson, toTransportError } from '../http/client.js';
import type { RequestLog } from '../http/client.js';
import {
  EVENT_STREAM_ENDPOINT,
  JSONRPC_VERSION,
  PROTOCOL_ENDPOINT,
  ProtocolResponseSchema,
} from './types.js';
import type { ProtocolRequest, ProtocolResponse, RpcError, StreamEvent } from './types.js';

/** The service answered with a JSON-RPC error object. */
export class ProtocolCallError extends HarnessError {
  readonly rpcCode: number;
  readonly rpcMessage: string;
  readonly rpcData?: unknown;

  constructor(method: string, error: RpcError) {
    super(HarnessErrorCode.PROTOCOL_ERROR, `${method} failed with JSON-RPC error ${error.code}: ${error.message}`, {
      method,
      code: error.code,
    });
    this.name = 'ProtocolCallError';
    this.rpcCode = error.code;
    this.rpcMessage = error.message;
    this.rpcData = error.data;
  }
}

export interface ProtocolClientOptions {
  timeoutMs: number;
  streamReadMs: number;
  clientName?: string;
}

export class ProtocolClient {
  private nextId = 1;

  constructor(
    readonly baseUrl: string,
    private readonly requestLog: RequestLog,
    private readonly options: ProtocolClientOptions
  ) {}

  /**
   * Sends one JSON-RPC request with a fresh id. Returns the envelope only when
   * it carries a result; an error member is thrown as ProtocolCallError and a
   * malformed envelope as PROTOCOL_VIOLATION.
   */
  async call(method: string, params?: unknown): Promise<ProtocolResponse> {
    const request: ProtocolRequest = { jsonrpc: JSONRPC_VERSION, id: this.nextId++, method };
    if (params !== undefined) request.params = params;
    const body = JSON.stringify(request);
    const url = `${this.baseUrl}${PROTOCOL_ENDPOINT}`;

    this.requestLog.log('RPC -> %s', body);
    let text: string;
    let status: number;
    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      const transport = toTransportError(err, 'POST', url);
      this.requestLog.log('RPC error: %s', transport.message);
      throw transport;
    }
    this.requestLog.log('RPC <- %d %s', status, text);

    const parsed = ProtocolResponseSchema.safeParse(parseJson(text, `${method} (HTTP ${status})`));
    if (!parsed.success) {
      throw new HarnessError(HarnessErrorCode.PROTOCOL_VIOLATION, `${method}: malformed JSON-RPC envelope`, {
        status,
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
      });
    }
    const envelope = parsed.data;
    if (envelope.id !== request.id) {
      throw new HarnessError(HarnessErrorCode.PROTOCOL_VIOLATION, `${method}: response id ${String(envelope.id)} does not match request id ${request.id}`);
    }
    if (envelope.error) throw new ProtocolCallError(method, envelope.error);
    if (envelope.result === undefined) {
      throw new HarnessError(HarnessErrorCode.PROTOCOL_VIOLATION, `${method}: response has neither result nor error`);
    }
    return envelope;
  }

  async initialize(): Promise<InitializeResult> {
    const response = await this.call('initialize', {
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: this.options.clientName ?? 'service-testbed', version: '0.1.0' },
    });
    return InitializeResultSchema.parse(response.result);
  }

  async listTools(): Promise<Tool[]> {
    const response = await this.call('tools/list');
    return ListToolsResultSchema.parse(response.result).tools;
  }

  async toolNames(): Promise<string[]> {
    return (await this.listTools()).map(t => t.name);
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
    const response = await this.call('tools/call', { name, arguments: args });
    return CallToolResultSchema.parse(response.result);
  }

  /** Text content of a tool result, joined by newlines. A result flagged isError throws. */
  async callToolText(name: string, args: Record<string, unknown> = {}): Promise<string> {
    const result = await this.callTool(name, args);
    const text = result.content
      .map(item => (isPlainObject(item) && item['type'] === 'text' && typeof item['text'] === 'string' ? item['text'] : ''))
      .filter(Boolean)
      .join('\n');
    if (result.isError) {
      throw new HarnessError(HarnessErrorCode.PROTOCOL_ERROR, `Tool ${name} reported an error: ${text}`, { tool: name });
    }
    return text;
  }

  /**
   * Opens the event stream, reads until the first complete event (or the read
   * window closes) and disconnects. The first event must announce the message
   * endpoint: `event: endpoint` with an http(s) URL as data.
   */
  async probeEventStream(): Promise<StreamEvent> {
    const url = `${this.baseUrl}${EVENT_STREAM_ENDPOINT}`;
    this.requestLog.log('GET %s (event stream)', EVENT_STREAM_ENDPOINT);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.streamReadMs);
    let raw = '';
    try {
      let response: Response;
      try {
        response = await fetch(url, { headers: { Accept: 'text/event-stream' }, signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) {
          throw new HarnessError(HarnessErrorCode.REQUEST_TIMEOUT, `GET ${url}: no response headers within ${this.options.streamReadMs}ms`);
        }
        throw toTransportError(err, 'GET', url);
      }
      if (response.status !== 200 || !response.body) {
        throw new HarnessError(HarnessErrorCode.PROTOCOL_VIOLATION, `GET ${url}: unexpected status ${response.status}`);
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      try {
        while (!/\r?\n\r?\n/.test(raw)) {
          const { done, value } = await reader.read();
          if (done) break;
          raw += decoder.decode(value, { stream: true });
        }
      } catch (err) {
        // The read window closing mid-event is expected; anything else is not.
        if (!controller.signal.aborted) throw toTransportError(err, 'GET', url);
      }
    } finally {
      clearTimeout(timer);
      controller.abort();
    }

    this.requestLog.log('Event stream start: %s', raw.trim());
    const event = parseFirstEvent(raw);
    if (event.event !== 'endpoint' || !/^https?:\/\//.test(event.data)) {
      throw new HarnessError(
        HarnessErrorCode.PROTOCOL_VIOLATION,
        'Event stream did not begin with an endpoint event carrying an http URL',
        { raw: raw.slice(0, 500) }
      );
    }
    return event;
  }
}

export function parseFirstEvent(raw: string): StreamEvent {
  const block = raw.replace(/\r\n/g, '\n').split('\n\n')[0] ?? '';
  let event = 'message';
  const data: string[] = [];
  for (const line of block.split('\n')) {
    if (line.startsWith(':')) continue;
    const colon = line.indexOf(':');
    const field = colon < 0 ? line : line.slice(0, colon);
    const value = colon < 0 ? '' : line.slice(colon + 1).replace(/^ /, '');
    if (field === 'event') event = value;
    else if (field === 'data') data.push(value);
  }
  return { event, data: data.join('\n'), raw };
}
