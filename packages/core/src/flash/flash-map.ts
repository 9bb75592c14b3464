import type { HttpRequest } from "@switchyard/types";

export type SerializedFlashMap = {
  attributes: Record<string, unknown>;
  targetRequestPath: string | null;
  targetRequestParams: Record<string, string[]>;
  expirationTime: number;
};

function queryValues(value: string | readonly string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : value;
}

/**
 * Attributes saved by one request for the next one, usually across a
 * redirect. An optional target path and target parameters narrow which
 * request may receive them.
 */
export class FlashMap {
  readonly attributes = new Map<string, unknown>();
  private targetPath: string | null = null;
  private readonly targetParams = new Map<string, string[]>();
  private expiration = -1;

  get(name: string): unknown {
    return this.attributes.get(name);
  }

  set(name: string, value: unknown): this {
    this.attributes.set(name, value);
    return this;
  }

  has(name: string): boolean {
    return this.attributes.has(name);
  }

  isEmpty(): boolean {
    return this.attributes.size === 0;
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.attributes);
  }

  get targetRequestPath(): string | null {
    return this.targetPath;
  }

  setTargetRequestPath(path: string | null): this {
    this.targetPath = path;
    return this;
  }

  get targetRequestParams(): ReadonlyMap<string, readonly string[]> {
    return this.targetParams;
  }

  /** Blank names and values are ignored. */
  addTargetRequestParam(name: string, value: string): this {
    if (!name.trim() || !value.trim()) return this;
    const values = this.targetParams.get(name);
    if (values) values.push(value);
    else this.targetParams.set(name, [value]);
    return this;
  }

  addTargetRequestParams(params: Readonly<Record<string, string | readonly string[]>>): this {
    for (const [name, value] of Object.entries(params)) {
      for (const v of queryValues(value)) this.addTargetRequestParam(name, v);
    }
    return this;
  }

  get expirationTime(): number {
    return this.expiration;
  }

  setExpirationTime(epochMs: number): void {
    this.expiration = epochMs;
  }

  startExpirationPeriod(timeToLiveSeconds: number, now: number = Date.now()): void {
    this.expiration = now + timeToLiveSeconds * 1000;
  }

  isExpired(now: number = Date.now()): boolean {
    return this.expiration !== -1 && now > this.expiration;
  }

  /**
   * True when the request is at the target path (a trailing slash is
   * tolerated) and carries every target parameter value.
   */
  matchesRequest(request: HttpRequest): boolean {
    const expectedPath = this.targetPath;
    if (expectedPath && request.path !== expectedPath && request.path !== `${expectedPath}/`) {
      return false;
    }
    for (const [name, expected] of this.targetParams) {
      const actual = queryValues(request.query[name]);
      if (!expected.every((value) => actual.includes(value))) return false;
    }
    return true;
  }

  /** Negative when this map is more specific: it has a target path, then more target params. */
  compareTo(other: FlashMap): number {
    const thisPath = this.targetPath !== null ? 1 : 0;
    const otherPath = other.targetPath !== null ? 1 : 0;
    if (thisPath !== otherPath) return otherPath - thisPath;
    return other.targetParams.size - this.targetParams.size;
  }

  toJSON(): SerializedFlashMap {
    return {
      attributes: this.toObject(),
      targetRequestPath: this.targetPath,
      targetRequestParams: Object.fromEntries(
        [...this.targetParams].map(([name, values]) => [name, [...values]]),
      ),
      expirationTime: this.expiration,
    };
  }

  static fromJSON(data: SerializedFlashMap): FlashMap {
    const flashMap = new FlashMap();
    for (const [name, value] of Object.entries(data.attributes)) flashMap.set(name, value);
    flashMap.setTargetRequestPath(data.targetRequestPath);
    flashMap.addTargetRequestParams(data.targetRequestParams);
    flashMap.setExpirationTime(data.expirationTime);
    return flashMap;
  }
}
