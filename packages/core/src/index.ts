// Contracts
export type {
  HandlerMapping,
  HandlerInterceptor,
  HandlerAdapter,
  HandlerExceptionResolver,
  View,
  ViewResolver,
  LocaleResolver,
  RequestToViewNameTranslator,
} from "./interfaces";

// Request attributes
export { AttributeKey } from "./metadata/attribute-key";

// Conditions
export {
  AbstractRequestCondition,
  NameValueExpression,
  ParamsRequestCondition,
  HeadersRequestCondition,
  RequestMethodsRequestCondition,
  PatternsRequestCondition,
  MediaTypeExpression,
  ConsumesRequestCondition,
  ProducesRequestCondition,
  RequestMappingInfo,
} from "./conditions";
export type { RequestCondition, RequestMappingOptions } from "./conditions";

// Flash attributes
export {
  FlashMap,
  InMemoryFlashStore,
  KeyedMutex,
  FlashMapManager,
  INPUT_FLASH_MAP,
  OUTPUT_FLASH_MAP,
  FLASH_MAP_MANAGER,
  getInputFlashAttributes,
  getOutputFlashMap,
  RedirectAttributes,
} from "./flash";
export type { FlashStore, SerializedFlashMap, FlashMapManagerOptions } from "./flash";

// Handlers and mappings
export {
  HandlerExecutionChain,
  HandlerMethod,
  describeHandler,
  MappedInterceptor,
  WebRequestHandlerInterceptorAdapter,
  AbstractHandlerMapping,
  RequestMappingHandlerMapping,
  SimpleUrlHandlerMapping,
  BEST_MATCHING_PATTERN,
  URI_TEMPLATE_VARIABLES,
} from "./handlers";
export type {
  ChainState,
  HandlerMethodContext,
  WebRequestInterceptor,
  HandlerMappingOptions,
  MappingRegistration,
  ControllerMappings,
  RequestMappingHandlerMappingOptions,
} from "./handlers";

// Adapters
export {
  resolveReturnValue,
  isView,
  FunctionHandlerAdapter,
  ControllerHandlerAdapter,
  HandlerMethodAdapter,
} from "./adapters";
export type { FunctionHandler, ReturnValueOptions } from "./adapters";
export { isController, UrlFilenameViewController } from "./mvc";
export type { Controller, UrlFilenameViewControllerOptions } from "./mvc";

// Async
export { DeferredResult, AsyncManager, getAsyncManager } from "./async";
export type { DeferredOutcome, DeferredResultOptions, AsyncDispatchOutcome } from "./async";

// Views
export {
  ModelAndView,
  RedirectView,
  JsonView,
  RedirectViewResolver,
  StaticViewResolver,
  DefaultRequestToViewNameTranslator,
} from "./views";
export type { RedirectViewOptions, ViewNameTranslatorOptions } from "./views";

// Locale and request context
export { AcceptHeaderLocaleResolver, FixedLocaleResolver } from "./i18n";
export { getRequestContext, getLocale } from "./context";
export type { RequestContext } from "./context";

// Errors
export {
  HttpException,
  BadRequestException,
  NotFoundException,
  MethodNotAllowedException,
  UnsupportedMediaTypeException,
  ServiceUnavailableException,
  NoHandlerFoundException,
  AsyncRequestTimeoutException,
  AsyncRequestCancelledError,
  ConfigurationError,
  AmbiguousMappingError,
  AdapterNotFoundError,
  ViewResolutionError,
  HttpExceptionResolver,
  SimpleMappingExceptionResolver,
} from "./errors";
export type { SimpleMappingExceptionResolverOptions } from "./errors";

// Dispatch
export { Dispatcher, DISPATCH_EXCEPTION, sendRedirect, isRedirect } from "./dispatch";
export type {
  DispatcherOptions,
  DispatchOutcome,
  RequestHandledEvent,
  RequestHandledListener,
} from "./dispatch";

// Testing
export { mockRequest, mockResponse, performRequest } from "./testing/mock-http";
export type { MockRequestOptions, PerformedRequest } from "./testing/mock-http";
