const WILDCARD = "*";

export class InvalidMediaTypeError extends Error {
  constructor(
    public readonly mediaType: string,
    reason: string,
  ) {
    super(`Invalid media type "${mediaType}": ${reason}`);
    this.name = "InvalidMediaTypeError";
  }
}

/**
 * An RFC 7231 media type (`type/subtype;param=value`) as used by the
 * `content-type` and `accept` headers.
 */
export class MediaType {
  static readonly ALL = new MediaType(WILDCARD, WILDCARD);
  static readonly APPLICATION_JSON = new MediaType("application", "json");
  static readonly APPLICATION_OCTET_STREAM = new MediaType("application", "octet-stream");

  readonly type: string;
  readonly subtype: string;
  readonly parameters: Readonly<Record<string, string>>;

  constructor(type: string, subtype: string, parameters: Record<string, string> = {}) {
    this.type = type.toLowerCase();
    this.subtype = subtype.toLowerCase();
    this.parameters = parameters;
  }

  static parse(value: string): MediaType {
    const [full = "", ...params] = value.split(";").map((part) => part.trim());
    const mediaType = full === WILDCARD ? "*/*" : full;
    const slash = mediaType.indexOf("/");
    if (slash === -1) {
      throw new InvalidMediaTypeError(value, 'does not contain "/"');
    }

    const type = mediaType.slice(0, slash);
    const subtype = mediaType.slice(slash + 1);
    if (!type || !subtype) {
      throw new InvalidMediaTypeError(value, "type and subtype must not be empty");
    }
    if (type === WILDCARD && subtype !== WILDCARD) {
      throw new InvalidMediaTypeError(value, "wildcard type is legal only in '*/*'");
    }

    const parameters: Record<string, string> = {};
    for (const param of params) {
      const eq = param.indexOf("=");
      if (eq === -1) continue;
      const name = param.slice(0, eq).trim().toLowerCase();
      parameters[name] = param
        .slice(eq + 1)
        .trim()
        .replace(/^"(.*)"$/, "$1");
    }

    return new MediaType(type, subtype, parameters);
  }

  /** Parses a comma-separated header value such as `accept`. */
  static parseList(header: string): MediaType[] {
    return header
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean)
      .map((part) => MediaType.parse(part));
  }

  get quality(): number {
    const q = this.parameters.q;
    if (q === undefined) return 1;
    const parsed = Number.parseFloat(q);
    return Number.isNaN(parsed) ? 1 : parsed;
  }

  get isWildcardType(): boolean {
    return this.type === WILDCARD;
  }

  get isWildcardSubtype(): boolean {
    return this.subtype === WILDCARD || this.subtype.startsWith("*+");
  }

  /** Whether this type, possibly a wildcard, includes the given one. */
  includes(other: MediaType): boolean {
    if (this.isWildcardType) return true;
    if (this.type !== other.type) return false;
    if (this.subtype === other.subtype) return true;
    if (!this.isWildcardSubtype) return false;

    const plus = this.subtype.indexOf("+");
    if (plus === -1) return true;

    const otherPlus = other.subtype.indexOf("+");
    return otherPlus !== -1 && this.subtype.slice(plus) === other.subtype.slice(otherPlus);
  }

  /** Whether either type includes the other. */
  isCompatibleWith(other: MediaType): boolean {
    return this.includes(other) || other.includes(this);
  }

  equalsTypeAndSubtype(other: MediaType): boolean {
    return this.type === other.type && this.subtype === other.subtype;
  }

  toString(): string {
    const params = Object.entries(this.parameters)
      .map(([name, value]) => `;${name}=${value}`)
      .join("");
    return `${this.type}/${this.subtype}${params}`;
  }
}

/** Highest quality first; more specific types first among equal quality. */
export function sortByQuality(types: readonly MediaType[]): MediaType[] {
  const specificity = (m: MediaType) => (m.isWildcardType ? 0 : m.isWildcardSubtype ? 1 : 2);
  return [...types].sort((a, b) => b.quality - a.quality || specificity(b) - specificity(a));
}
