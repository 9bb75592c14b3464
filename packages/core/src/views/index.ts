export { ModelAndView } from "./model-and-view";
export { RedirectView } from "./redirect-view";
export type { RedirectViewOptions } from "./redirect-view";
export { JsonView } from "./json-view";
export {
  RedirectViewResolver,
  StaticViewResolver,
  REDIRECT_URL_PREFIX,
  isRedirectViewName,
} from "./view-resolvers";
export { DefaultRequestToViewNameTranslator, extractViewNameFromPath } from "./view-name-translator";
export type { ViewNameTranslatorOptions } from "./view-name-translator";
