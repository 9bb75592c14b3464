import createDebug from "debug";
import type { HttpRequest } from "@switchyard/types";
import type { FlashMap } from "./flash-map";

const debug = createDebug("switchyard:core:flash");

/**
 * Session-keyed storage for pending flash maps. Implementations must make
 * retrieve-and-remove atomic per session so two concurrent requests never
 * both receive the same map.
 */
export interface FlashStore {
  save(flashMap: FlashMap, sessionKey: string): Promise<void>;

  /**
   * Drops the session's expired maps, then removes and returns the most
   * specific map that targets the request.
   */
  retrieveAndRemoveBestMatch(
    sessionKey: string,
    request: HttpRequest,
    now: number,
  ): Promise<FlashMap | null>;

  /** Drops expired maps across all sessions and returns how many went. */
  sweepExpired(now: number): Promise<number>;
}

/** Serializes async critical sections that share a key. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    // The tail only orders the next caller; failures reach our caller through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}

export class InMemoryFlashStore implements FlashStore {
  private readonly sessions = new Map<string, FlashMap[]>();
  private readonly mutex = new KeyedMutex();

  save(flashMap: FlashMap, sessionKey: string): Promise<void> {
    return this.mutex.runExclusive(sessionKey, () => {
      const maps = this.sessions.get(sessionKey);
      if (maps) maps.push(flashMap);
      else this.sessions.set(sessionKey, [flashMap]);
    });
  }

  retrieveAndRemoveBestMatch(
    sessionKey: string,
    request: HttpRequest,
    now: number,
  ): Promise<FlashMap | null> {
    return this.mutex.runExclusive(sessionKey, () => {
      const live = (this.sessions.get(sessionKey) ?? []).filter((m) => !m.isExpired(now));
      const best = live.filter((m) => m.matchesRequest(request)).sort((a, b) => a.compareTo(b))[0];
      const remaining = best ? live.filter((m) => m !== best) : live;

      if (remaining.length > 0) this.sessions.set(sessionKey, remaining);
      else this.sessions.delete(sessionKey);

      debug(
        "retrieveAndRemoveBestMatch: session=%s found=%s remaining=%d",
        sessionKey,
        best !== undefined,
        remaining.length,
      );
      return best ?? null;
    });
  }

  async sweepExpired(now: number): Promise<number> {
    let removed = 0;
    for (const sessionKey of [...this.sessions.keys()]) {
      removed += await this.mutex.runExclusive(sessionKey, () => {
        const maps = this.sessions.get(sessionKey) ?? [];
        const live = maps.filter((m) => !m.isExpired(now));
        if (live.length > 0) this.sessions.set(sessionKey, live);
        else this.sessions.delete(sessionKey);
        return maps.length - live.length;
      });
    }
    return removed;
  }

  /** Pending maps for a session, oldest first. */
  peek(sessionKey: string): readonly FlashMap[] {
    return this.sessions.get(sessionKey) ?? [];
  }
}
