import createDebug from "debug";

const debug = createDebug("switchyard:config:env");

const PREFIX = "SWITCHYARD_";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

/**
 * Typed readers over `SWITCHYARD_*` environment variables. Values that do not
 * parse fall back to the supplied default.
 */
export class SwitchyardEnv {
  static get(name: string): string | undefined {
    const value = process.env[`${PREFIX}${name}`];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  }

  static getBoolean(name: string, fallback: boolean): boolean {
    const raw = SwitchyardEnv.get(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    if (TRUE_VALUES.has(raw)) return true;
    if (FALSE_VALUES.has(raw)) return false;
    debug("%s%s: %o is not a boolean, using %s", PREFIX, name, raw, fallback);
    return fallback;
  }

  static getInteger(name: string, fallback: number, min = 0): number {
    const raw = SwitchyardEnv.get(name);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
      debug("%s%s: %o is not an integer >= %d, using %d", PREFIX, name, raw, min, fallback);
      return fallback;
    }
    return parsed;
  }

  static getAll(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (key.startsWith(PREFIX) && value !== undefined) {
        result[key.slice(PREFIX.length)] = value;
      }
    }
    return result;
  }
}
