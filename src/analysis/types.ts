import type { Change } from '../diff/types.js';

export interface RepositoryAnalysis {
  /** In diff order. */
  changedFiles: Change[];
  allTrackedFiles: string[];
  /** The base the changes were computed against. */
  defaultBranch: string;
  currentBranch: string;
  repositoryRoot: string;
  totalChanges: number;
  hasChanges: boolean;
}
