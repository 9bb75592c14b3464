export { AcceptHeaderLocaleResolver, FixedLocaleResolver } from "./locale-resolvers";
export type { AcceptHeaderLocaleResolverOptions } from "./locale-resolvers";
