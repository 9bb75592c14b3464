export { runWithRequestContext, getRequestContext, getLocale } from "./request-context";
export type { RequestContext } from "./request-context";
