/**
 * Types for BranchAllocator.
 *
 * @module branch_allocator
 */

import type { IHostingPlatform } from '../hosting_platform';
import type { Logger } from '../logger';

/**
 * Dependencies for BranchAllocator.
 */
export type BranchAllocatorDependencies = {
  /** Platform that owns the branches */
  platform: IHostingPlatform;
  /** Collisions tolerated before giving up (default: 15, so 16 attempts) */
  maxRetries?: number;
  logger?: Logger;
};

export interface IBranchAllocator {
  /**
   * Creates a fresh branch off the main tip named `baseName`, or
   * `baseName-N` for the lowest free N.
   */
  allocate(baseName: string): Promise<string>;
}
