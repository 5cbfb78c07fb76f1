export { resolveEntities, shouldRefineType } from './resolver';
export type { EntityResolverDeps } from './types';
