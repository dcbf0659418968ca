/**
 * @strongbox/event-store - In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for tests, the development
 * server and short-lived processes; all state is lost on exit.
 *
 * Subscriptions are dispatched synchronously on append.
 */

import type { DomainEvent } from "@strongbox/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    this._checkExpectedVersion(streamId, stream.length, options);

    const fromVersion = stream.length + 1;
    const fromPosition = this._globalLog.length + 1;
    const appended: StoredEvent[] = [];

    events.forEach((event, i) => {
      const base = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: fromPosition + i,
      };
      const previousHash = this._lastHash;
      const hash = computeEventHash(base, previousHash);
      const stored: StoredEvent = { ...base, hash, previousHash };

      this._lastHash = hash;
      stream.push(stored);
      this._globalLog.push(stored);
      appended.push(stored);
    });

    this._streams.set(streamId, stream);

    for (const handler of this._subscribers) {
      for (const stored of appended) {
        handler(stored);
      }
    }

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      fromPosition,
      toPosition: fromPosition + events.length - 1,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return limit(
      stream.filter((e) => e.version >= fromVersion),
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const types = options?.types !== undefined ? new Set(options.types) : undefined;

    const matching = this._globalLog.filter(
      (e) =>
        e.globalPosition >= fromPosition &&
        (types === undefined || types.has(e.event.type)),
    );
    return limit(matching, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options: AppendOptions | undefined,
  ): void {
    const expected = options?.expectedVersion ?? "any";
    if (expected === "any") return;

    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }
}

function limit<T>(items: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? items.slice(0, maxCount) : items;
}
