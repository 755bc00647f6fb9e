export {
  BranchAllocator,
  branchCandidate,
  DEFAULT_BRANCH_ALLOCATION_MAX_RETRIES,
} from './branch_allocator';
export type { BranchAllocatorDependencies, IBranchAllocator } from './branch_allocator.types';
