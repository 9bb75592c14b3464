export { resolveReturnValue, isView } from "./return-values";
export type { ReturnValueOptions } from "./return-values";
export { FunctionHandlerAdapter } from "./function-handler-adapter";
export type { FunctionHandler } from "./function-handler-adapter";
export { ControllerHandlerAdapter } from "./controller-handler-adapter";
export { HandlerMethodAdapter } from "./handler-method-adapter";
