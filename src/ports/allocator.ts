import net from 'net';
import { Mutex } from 'async-mutex';
import { componentLogger } from '../shared/logger.js';

const log = componentLogger('ports');

export type PortProbe = (port: number) => Promise<boolean>;

// Binds loopback and closes immediately; true if the bind succeeded.
export const probeLoopbackPort: PortProbe = (port) =>
  new Promise(resolve => {
    const server = net.createServer();
    server.unref();
    server.once('error', () => resolve(false));
    server.listen({ port, host: '127.0.0.1', exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });

export interface PortAllocatorOptions {
  start?: number;
  probeAttempts?: number;
  probe?: PortProbe;
}

/**
 * Hands out loopback ports to concurrent environments. The counter only moves
 * forward, and the probe plus counter advance happen inside one critical
 * section, so two callers never receive the same port. Leased ports are
 * skipped until released even if nothing is listening on them yet.
 */
export class PortAllocator {
  private readonly mutex = new Mutex();
  private readonly probeAttempts: number;
  private readonly probe: PortProbe;
  private readonly leased = new Set<number>();
  private counter: number;

  constructor(options: PortAllocatorOptions = {}) {
    this.counter = options.start ?? 19000;
    this.probeAttempts = options.probeAttempts ?? 100;
    this.probe = options.probe ?? probeLoopbackPort;
  }

  async next(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      for (let i = 0; i < this.probeAttempts; i++) {
        const candidate = this.advance();
        if (await this.probe(candidate)) {
          this.leased.add(candidate);
          return candidate;
        }
      }
      // Nothing bindable within the attempt budget: hand out the next port unchecked.
      const fallback = this.advance();
      log.warn({ port: fallback, attempts: this.probeAttempts }, 'no bindable port found; returning unchecked port');
      this.leased.add(fallback);
      return fallback;
    });
  }

  release(port: number): void {
    this.leased.delete(port);
  }

  isLeased(port: number): boolean {
    return this.leased.has(port);
  }

  private advance(): number {
    do {
      this.counter++;
      if (this.counter > 65535) this.counter = 1025;
    } while (this.leased.has(this.counter));
    return this.counter;
  }
}

let shared: PortAllocator | undefined;

// One allocator per process unless a caller injects its own; options apply on first use only.
export function sharedPortAllocator(options?: PortAllocatorOptions): PortAllocator {
  shared ??= new PortAllocator(options);
  return shared;
}
