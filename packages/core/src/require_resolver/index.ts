export { RequireResolver, formatRequireLine } from './require_resolver';
export type { RequireResolverDependencies } from './require_resolver.types';
