import { AttributeKey, isString, isStringRecord } from "../../metadata/attribute-key";

/** The pattern of the winning mapping, e.g. "/accounts/{id}". */
export const BEST_MATCHING_PATTERN = new AttributeKey("switchyard.mapping.bestMatchingPattern", isString);

/** Template variables the winning pattern captured from the path. */
export const URI_TEMPLATE_VARIABLES = new AttributeKey(
  "switchyard.mapping.uriTemplateVariables",
  isStringRecord,
);
