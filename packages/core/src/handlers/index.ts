export { HandlerExecutionChain } from "./execution-chain";
export type { ChainState } from "./execution-chain";
export { HandlerMethod, describeHandler } from "./handler-method";
export type { HandlerMethodContext } from "./handler-method";
export { MappedInterceptor, WebRequestHandlerInterceptorAdapter } from "./interceptors";
export type { WebRequestInterceptor } from "./interceptors";
export { AbstractHandlerMapping } from "./mapping/abstract-handler-mapping";
export type { HandlerMappingOptions } from "./mapping/abstract-handler-mapping";
export { RequestMappingHandlerMapping } from "./mapping/request-mapping-handler-mapping";
export type {
  MappingRegistration,
  ControllerMappings,
  RequestMappingHandlerMappingOptions,
} from "./mapping/request-mapping-handler-mapping";
export { SimpleUrlHandlerMapping } from "./mapping/simple-url-handler-mapping";
export { BEST_MATCHING_PATTERN, URI_TEMPLATE_VARIABLES } from "./mapping/attributes";
