export { BatchResolver, partitionOutcomes } from './batch_resolver';
export type {
  ResolutionOutcome,
  ResolutionSuccess,
  ResolutionFailure,
  VersionSource,
} from './batch_resolver.types';
