export { FlashMap } from "./flash-map";
export type { SerializedFlashMap } from "./flash-map";
export { InMemoryFlashStore, KeyedMutex } from "./flash-store";
export type { FlashStore } from "./flash-store";
export {
  FlashMapManager,
  INPUT_FLASH_MAP,
  OUTPUT_FLASH_MAP,
  FLASH_MAP_MANAGER,
  getInputFlashAttributes,
  getOutputFlashMap,
} from "./flash-map-manager";
export type { FlashMapManagerOptions } from "./flash-map-manager";
export { RedirectAttributes } from "./redirect-attributes";
