export {
  HttpException,
  BadRequestException,
  NotFoundException,
  MethodNotAllowedException,
  UnsupportedMediaTypeException,
  ServiceUnavailableException,
} from "./http-exception";
export {
  NoHandlerFoundException,
  AsyncRequestTimeoutException,
  AsyncRequestCancelledError,
  ConfigurationError,
  AmbiguousMappingError,
  AdapterNotFoundError,
  ViewResolutionError,
  toError,
} from "./dispatch-errors";
export { HttpExceptionResolver, SimpleMappingExceptionResolver } from "./exception-resolvers";
export type { SimpleMappingExceptionResolverOptions } from "./exception-resolvers";
