// Issues requests from inside the driver container, so every call crosses the
// container network and resolves the service by its alias.
import { z } from 'zod';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { parseScrubbed, stripControlSequences } from '../shared/json-scrub.js';
import { ProtocolCallError } from '../protocol/client.js';
import { JSONRPC_VERSION, PROTOCOL_ENDPOINT, ProtocolResponseSchema } from '../protocol/types.js';
import type { ContainerOrchestrator } from './orchestrator.js';
import { shellQuote } from './orchestrator.js';

export interface DriverResponse {
  status: number;
  body: string;
  json(): unknown;
}

const ProjectCreatedSchema = z.object({ id: z.coerce.string() }).passthrough();

// curl exit codes worth telling apart
const CURL_COULDNT_RESOLVE = 6;
const CURL_COULDNT_CONNECT = 7;
const CURL_TIMEOUT = 28;

/** Builds the shell line for one curl request; the body is piped on stdin. */
export function curlCommand(method: string, url: string, body: unknown, maxTimeSeconds: number): string {
  const parts = ['curl', '-sS', '--max-time', String(maxTimeSeconds), '-X', method, '-w', shellQuote('\\n%{http_code}')];
  if (body === undefined) return [...parts, shellQuote(url)].join(' ');
  const payload = shellQuote(JSON.stringify(body));
  return `printf '%s' ${payload} | ${[...parts, '-H', shellQuote('Content-Type: application/json'), '--data-binary', '@-', shellQuote(url)].join(' ')}`;
}

/** Splits curl output written with `-w '\n%{http_code}'` into body and status. */
export function parseCurlOutput(output: string): { status: number; body: string } {
  const clean = stripControlSequences(output).replace(/\s+$/, '');
  const match = clean.match(/(?:^|\n)(\d{3})$/);
  if (!match || match.index === undefined) {
    throw new HarnessError(HarnessErrorCode.PROTOCOL_VIOLATION, 'curl output has no status line', {
      output: clean.slice(-500),
    });
  }
  return { status: parseInt(match[1], 10), body: clean.slice(0, match.index) };
}

export class DriverClient {
  private nextId = 1;

  constructor(
    private readonly orchestrator: ContainerOrchestrator,
    private readonly options: { timeoutMs: number; healthPath?: string }
  ) {}

  get serviceUrl(): string {
    return this.orchestrator.internalBaseUrl;
  }

  async request(method: string, url: string, body?: unknown): Promise<DriverResponse> {
    const maxTime = Math.max(1, Math.ceil(this.options.timeoutMs / 1000));
    const result = await this.orchestrator.execBash('driver', curlCommand(method, url, body, maxTime));
    if (result.exitCode !== 0) {
      const output = stripControlSequences(result.output).trim();
      if (result.exitCode === CURL_TIMEOUT) {
        throw new HarnessError(HarnessErrorCode.REQUEST_TIMEOUT, `${method} ${url} timed out from driver`, { output });
      }
      const reason =
        result.exitCode === CURL_COULDNT_RESOLVE ? 'could not resolve host'
        : result.exitCode === CURL_COULDNT_CONNECT ? 'connection refused'
        : `curl exited with ${result.exitCode}`;
      throw new HarnessError(HarnessErrorCode.REQUEST_FAILED, `${method} ${url} failed from driver: ${reason}`, {
        exitCode: result.exitCode,
        output,
      });
    }
    const { status, body: text } = parseCurlOutput(result.output);
    return { status, body: text, json: () => parseScrubbed(text) };
  }

  async health(): Promise<unknown> {
    const response = await this.expectOk('GET', `${this.serviceUrl}${this.options.healthPath ?? '/health'}`);
    return response.json();
  }

  /**
   * GET the health path of an arbitrary alias on the network. An alias that
   * is not registered fails with REQUEST_FAILED, never an empty response.
   */
  async probeAlias(alias: string, port?: number): Promise<number> {
    const target = new URL(this.serviceUrl);
    target.hostname = alias;
    if (port !== undefined) target.port = String(port);
    target.pathname = this.options.healthPath ?? '/health';
    const response = await this.request('GET', target.toString());
    return response.status;
  }

  async registerProject(name: string, projectPath: string): Promise<string> {
    const response = await this.expectOk('POST', `${this.serviceUrl}/projects`, { name, path: projectPath });
    return ProjectCreatedSchema.parse(response.json()).id;
  }

  async indexProject(id: string): Promise<unknown> {
    const response = await this.expectOk('POST', `${this.serviceUrl}/projects/${encodeURIComponent(id)}/index`, {});
    return response.body.trim() ? response.json() : null;
  }

  async listProjects(): Promise<unknown> {
    return (await this.expectOk('GET', `${this.serviceUrl}/projects`)).json();
  }

  async search(id: string, query: string, limit?: number): Promise<unknown> {
    const body: Record<string, unknown> = { query };
    if (limit !== undefined) body['limit'] = limit;
    const response = await this.expectOk('POST', `${this.serviceUrl}/projects/${encodeURIComponent(id)}/search`, body);
    return response.json();
  }

  /** tools/call over JSON-RPC, sent from the driver. */
  async toolCall(name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
    const id = this.nextId++;
    const envelope = { jsonrpc: JSONRPC_VERSION, id, method: 'tools/call', params: { name, arguments: args } };
    const response = await this.request('POST', `${this.serviceUrl}${PROTOCOL_ENDPOINT}`, envelope);
    const parsed = ProtocolResponseSchema.safeParse(response.json());
    if (!parsed.success || parsed.data.id !== id) {
      throw new HarnessError(HarnessErrorCode.PROTOCOL_VIOLATION, `tools/call ${name}: malformed JSON-RPC envelope`, {
        status: response.status,
      });
    }
    if (parsed.data.error) throw new ProtocolCallError('tools/call', parsed.data.error);
    if (parsed.data.result === undefined) {
      throw new HarnessError(HarnessErrorCode.PROTOCOL_VIOLATION, `tools/call ${name}: response has neither result nor error`);
    }
    return CallToolResultSchema.parse(parsed.data.result);
  }

  private async expectOk(method: string, url: string, body?: unknown): Promise<DriverResponse> {
    const response = await this.request(method, url, body);
    if (response.status < 200 || response.status >= 300) {
      throw new HarnessError(HarnessErrorCode.REQUEST_FAILED, `${method} ${url}: unexpected status ${response.status}`, {
        status: response.status,
        body: response.body.slice(0, 500),
      });
    }
    return response;
  }
}
