import { tileKey, type TileAddress } from '../../src/address.js';
import { NetworkFailure } from '../../src/errors.js';
import type { TileSource } from '../../src/source/source.js';

type FakeResponse = Uint8Array | Error;

/**
 * In-process {@link TileSource}. Responses are registered per tile key;
 * unknown tiles fail with a 404. Every fetch is recorded, and fetches can be
 * held open with {@link FakeTileSource.hold} until released.
 */
export class FakeTileSource implements TileSource {
  readonly calls: string[] = [];
  closed = false;
  private readonly responses = new Map<string, FakeResponse>();
  private gate: Promise<void> | null = null;
  private openGate: (() => void) | null = null;

  set(key: string, response: FakeResponse): this {
    this.responses.set(key, response);
    return this;
  }

  url(address: TileAddress): string {
    return `fake://${tileKey(address)}`;
  }

  fetchCount(key: string): number {
    return this.calls.filter(k => k === key).length;
  }

  /** Block every fetch until {@link release} is called. */
  hold(): void {
    this.gate = new Promise(resolve => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = null;
    this.openGate = null;
  }

  async fetch(address: TileAddress): Promise<Uint8Array> {
    const key = tileKey(address);
    this.calls.push(key);
    if (this.gate) await this.gate;

    const response = this.responses.get(key);
    if (response instanceof Error) throw response;
    if (!response) throw new NetworkFailure(`HTTP 404 fetching ${this.url(address)}`, address, { status: 404 });
    return response;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
