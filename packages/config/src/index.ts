export { SwitchyardEnv } from "./env";
export {
  readDispatcherConfig,
  readTrailingSlashMatch,
  DEFAULT_DISPATCHER_CONFIG,
} from "./dispatcher-config";
export type { DispatcherConfig } from "./dispatcher-config";
