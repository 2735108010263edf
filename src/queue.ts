/**
 * @module queue
 *
 * LIFO fetch queue with in-flight deduplication, shared by the workers of
 * one pool.
 *
 * The queue tracks two disjoint sets of addresses:
 *
 * - **queued** -- pushed and waiting, served most-recent-first
 * - **active** -- handed to a worker and not yet {@link FetchQueue.complete | completed}
 *
 * An address is in at most one of them, at most once. Every mutation runs
 * synchronously within one turn of the event loop, so the stack and both
 * sets always change together and no lock is needed.
 */

import { freezeAddress, tileId, type TileAddress } from './address.js';

type Waiter = (address: TileAddress | null) => void;

export class FetchQueue {
  private stack: TileAddress[] = [];
  private readonly queued = new Set<number>();
  private readonly active = new Set<number>();
  private readonly waiters: Waiter[] = [];
  private closed = false;

  /** Addresses waiting to be served. */
  get size(): number {
    return this.stack.length;
  }

  /** Addresses handed to a worker and not yet completed. */
  get activeCount(): number {
    return this.active.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  isQueued(address: TileAddress): boolean {
    return this.queued.has(tileId(address));
  }

  isActive(address: TileAddress): boolean {
    return this.active.has(tileId(address));
  }

  /**
   * Queue an address at the head, so it is served next.
   *
   * If a worker is already waiting, the address goes straight to it. The
   * queue keeps its own frozen copy, so callers may reuse their object.
   *
   * @param address - Tile to fetch.
   * @returns `false` (and changes nothing) when the address is already
   *   queued or in flight, or the queue is closed.
   */
  push(address: TileAddress): boolean {
    if (this.closed) return false;

    const entry = freezeAddress(address);
    const id = tileId(entry);
    if (this.queued.has(id) || this.active.has(id)) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      this.active.add(id);
      waiter(entry);
      return true;
    }

    this.stack.push(entry);
    this.queued.add(id);
    return true;
  }

  /**
   * Take the most recently pushed address and mark it active, or return
   * `undefined` when nothing is queued.
   */
  tryPop(): TileAddress | undefined {
    const address = this.stack.pop();
    if (!address) return undefined;

    const id = tileId(address);
    this.queued.delete(id);
    this.active.add(id);
    return address;
  }

  /**
   * Wait for the next address.
   *
   * @returns The address, now active, or `null` once the queue is closed.
   */
  pop(): Promise<TileAddress | null> {
    if (this.closed) return Promise.resolve(null);

    const address = this.tryPop();
    if (address) return Promise.resolve(address);

    return new Promise<TileAddress | null>(resolve => {
      this.waiters.push(resolve);
    });
  }

  /** Release the in-flight slot of a popped address. */
  complete(address: TileAddress): void {
    this.active.delete(tileId(address));
  }

  /**
   * Drop queued addresses that have not started yet and match `isStale`.
   * Active addresses are left to finish. If `isStale` throws, the queue is
   * left unchanged.
   *
   * @param isStale - Predicate selecting the addresses to drop.
   * @returns The removed addresses, in queue order.
   */
  cancelStale(isStale: (address: TileAddress) => boolean): TileAddress[] {
    const removed: TileAddress[] = [];
    const kept: TileAddress[] = [];

    for (const address of this.stack) {
      (isStale(address) ? removed : kept).push(address);
    }

    this.stack = kept;
    for (const address of removed) this.queued.delete(tileId(address));
    return removed;
  }

  /** Drop every queued address. @returns The removed addresses. */
  clear(): TileAddress[] {
    return this.cancelStale(() => true);
  }

  /**
   * Stop accepting work. Waiting and future {@link pop} calls resolve to
   * `null`; queued addresses stay until {@link clear}ed.
   */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }
}
