export { isController } from "./controller";
export type { Controller } from "./controller";
export { UrlFilenameViewController } from "./url-filename-view-controller";
export type { UrlFilenameViewControllerOptions } from "./url-filename-view-controller";
