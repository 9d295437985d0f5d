import type { PageReconstruction } from '@regroup/model';

/**
 * Persistence of page reconstructions, keyed by job and page
 */
export interface ReconstructionResultStore {
  /**
   * Insert a reconstruction
   *
   * Must reject with a duplicate-key error (`DuplicateKeyError` or a driver
   * error carrying a unique-violation code) when the key already exists.
   */
  save(
    jobId: string,
    pageKey: string,
    reconstruction: PageReconstruction,
  ): Promise<PageReconstruction>;

  /**
   * Committed reconstruction for a key, if any
   */
  load(jobId: string, pageKey: string): Promise<PageReconstruction | undefined>;
}

/**
 * Outcome of committing one page
 */
export interface CommitResult {
  reconstruction: PageReconstruction;

  /** True when an earlier commit of the same key was returned */
  reusedExisting: boolean;
}

export interface ReconstructDocumentOptions {
  /**
   * Pages reconstructed at the same time (default: 1)
   */
  concurrency?: number;

  /**
   * Checked between pages; a page that started always finishes
   */
  abortSignal?: AbortSignal;

  /**
   * Fired after each page completes
   */
  onPageComplete?: (reconstruction: PageReconstruction, index: number) => void;
}
