import createDebug from "debug";
import { SwitchyardEnv } from "./env";

const debug = createDebug("switchyard:config");

export type DispatcherConfig = {
  /** Seconds a saved flash map stays retrievable. */
  flashTimeToLiveSeconds: number;
  /** Default timeout for concurrent handling started by a handler. */
  asyncTimeoutMs: number;
  /** Route unmatched requests through the exception resolvers instead of answering 404. */
  throwIfNoHandlerFound: boolean;
  /** Publish a request-handled event after each dispatch pass. */
  publishEvents: boolean;
  /** Locale used when the request does not name one. */
  defaultLocale: string;
};

export const DEFAULT_DISPATCHER_CONFIG: Readonly<DispatcherConfig> = {
  flashTimeToLiveSeconds: 180,
  asyncTimeoutMs: 30_000,
  throwIfNoHandlerFound: false,
  publishEvents: true,
  defaultLocale: "en",
};

export function readDispatcherConfig(
  overrides: Partial<DispatcherConfig> = {},
): DispatcherConfig {
  const defaults = DEFAULT_DISPATCHER_CONFIG;
  const config: DispatcherConfig = {
    flashTimeToLiveSeconds: SwitchyardEnv.getInteger(
      "FLASH_TTL_SECONDS",
      defaults.flashTimeToLiveSeconds,
    ),
    asyncTimeoutMs: SwitchyardEnv.getInteger("ASYNC_TIMEOUT_MS", defaults.asyncTimeoutMs, 1),
    throwIfNoHandlerFound: SwitchyardEnv.getBoolean(
      "THROW_IF_NO_HANDLER_FOUND",
      defaults.throwIfNoHandlerFound,
    ),
    publishEvents: SwitchyardEnv.getBoolean("PUBLISH_EVENTS", defaults.publishEvents),
    defaultLocale: SwitchyardEnv.get("DEFAULT_LOCALE") ?? defaults.defaultLocale,
    ...overrides,
  };
  debug("readDispatcherConfig: %o", config);
  return config;
}

/**
 * Default for handler mappings constructed without `trailingSlashMatch`:
 * whether "/users/" matches patterns declared as "/users". Set per mapping;
 * the dispatcher does not carry it.
 */
export function readTrailingSlashMatch(): boolean {
  return SwitchyardEnv.getBoolean("TRAILING_SLASH_MATCH", true);
}
