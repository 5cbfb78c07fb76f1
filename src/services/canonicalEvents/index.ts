export { CanonicalEventResolver, resolveCanonicalEvent } from './resolver';
export { evaluateCandidates, selectThreshold, similarityFromDistance } from './thresholding';
export type {
  CandidateEvaluation,
  CanonicalEventResolverDeps,
  ResolutionItem,
  ResolutionStats,
  ResolvedEntityRef,
  ResolvedItem,
} from './types';
