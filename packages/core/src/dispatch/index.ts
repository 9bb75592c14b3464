export { Dispatcher, DISPATCH_EXCEPTION } from "./dispatcher";
export type { DispatcherOptions } from "./dispatcher";
export { describeEvent } from "./events";
export type { DispatchOutcome, RequestHandledEvent, RequestHandledListener } from "./events";
export { sendRedirect, isRedirect, checkNotModified, getHeader } from "./http-utils";
