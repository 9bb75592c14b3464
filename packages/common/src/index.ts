export {
  joinHandlerPath,
  isPattern,
  matchPath,
  extractUriTemplateVariables,
  getPatternComparator,
} from "./path";
export type { PathMatchOptions } from "./path";

export { MediaType, InvalidMediaTypeError, sortByQuality } from "./media-type";

export { LOWEST_PRECEDENCE, getOrder, sortByOrder } from "./order";
