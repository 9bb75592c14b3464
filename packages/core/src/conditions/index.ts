export { AbstractRequestCondition, uniqueExpressions } from "./request-condition";
export type { RequestCondition } from "./request-condition";
export { NameValueExpression } from "./name-value-expression";
export { ParamsRequestCondition } from "./params-condition";
export { HeadersRequestCondition } from "./headers-condition";
export { RequestMethodsRequestCondition } from "./methods-condition";
export { PatternsRequestCondition } from "./patterns-condition";
export type { PatternsConditionOptions } from "./patterns-condition";
export {
  MediaTypeExpression,
  ConsumesRequestCondition,
  ProducesRequestCondition,
} from "./media-type-conditions";
export { RequestMappingInfo } from "./request-mapping-info";
export type { RequestMappingOptions } from "./request-mapping-info";
