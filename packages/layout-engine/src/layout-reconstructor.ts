import type { LoggerMethods } from '@regroup/logger';
import type {
  LayoutGroup,
  LayoutProfile,
  PageAudit,
  PageInput,
  PageLayout,
  PageReconstruction,
  ValidationResult,
} from '@regroup/model';

import type {
  EngineOptions,
  EngineOptionsInput,
} from './config/engine-options';
import type { AssignmentStrategy } from './strategies/assignment-strategy';
import type {
  CommitResult,
  ReconstructDocumentOptions,
  ReconstructionResultStore,
} from './types';

import {
  ConcurrentPool,
  JobLockRegistry,
  executeIdempotentWrite,
} from '@regroup/shared';

import { resolveEngineOptions } from './config/engine-options';
import { CorrectionEngine } from './correction/correction-engine';
import { filterElements } from './elements/element-filter';
import { parsePageInput } from './elements/element-schema';
import { GroupCollection } from './groups/group-collection';
import { LayoutProfiler } from './profiler/layout-profiler';
import { describePageLayout } from './profiler/page-layout';
import { StrategySelector } from './strategies/strategy-selector';
import { LayoutValidator } from './validators/layout-validator';
import { SequenceValidator } from './validators/sequence-validator';

/**
 * LayoutReconstructor Options
 */
export interface LayoutReconstructorOptions {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Engine tuning; omitted values take their defaults
   */
  engineOptions?: EngineOptionsInput;

  /**
   * Lock registry shared with other reconstructors committing to the same
   * store. A private registry is created when omitted.
   */
  lockRegistry?: JobLockRegistry;
}

/**
 * LayoutReconstructor
 *
 * Turns the unordered elements of a page into ordered question groups.
 *
 * ## Page Pipeline
 *
 * 1. Validate input and drop unusable elements
 * 2. Profile the layout (skipped when a strategy is forced)
 * 3. Partition with the selected strategy
 * 4. Validate sequence and spatial consistency
 * 5. Correct when invalid, then validate again
 * 6. Audit the result: oversized groups, likely digit misreads and
 *    repeated numbers
 *
 * Pages are independent; a document is processed as a pool of page jobs.
 * Committing a page is serialized per job and idempotent per page key.
 *
 * @example
 * ```typescript
 * import { LayoutReconstructor } from '@regroup/layout-engine';
 * import { createConsoleLogger } from '@regroup/logger';
 *
 * const reconstructor = new LayoutReconstructor({
 *   logger: createConsoleLogger(),
 *   engineOptions: { columnOrder: 'row-major' },
 * });
 *
 * const page = reconstructor.reconstructPage({ width: 2480, elements });
 * const result = await reconstructor.commitPage('job-1', '1', page, store);
 * ```
 */
export class LayoutReconstructor {
  private readonly logger: LoggerMethods;
  private readonly options: EngineOptions;
  private readonly profiler: LayoutProfiler;
  private readonly selector: StrategySelector;
  private readonly validator: LayoutValidator;
  private readonly corrector: CorrectionEngine;
  private readonly locks: JobLockRegistry;

  /**
   * @throws {InvalidEngineOptionsError} When an engine option is out of range
   */
  constructor(options: LayoutReconstructorOptions) {
    this.logger = options.logger;
    this.options = resolveEngineOptions(options.engineOptions);
    this.profiler = new LayoutProfiler(this.logger);
    this.selector = new StrategySelector(this.logger, this.options);
    this.validator = new LayoutValidator(this.logger, this.options);
    this.corrector = new CorrectionEngine(this.logger, this.options);
    this.locks =
      options.lockRegistry ??
      new JobLockRegistry(this.logger, {
        timeoutMs: this.options.jobLockTimeoutSeconds * 1000,
      });
  }

  /**
   * Reconstruct one page
   *
   * @throws {MalformedElementError} When the page does not match the input
   * schema
   */
  reconstructPage(page: PageInput): PageReconstruction {
    const input = parsePageInput(page);
    const { kept, dropped } = filterElements(input.elements, this.options);
    if (dropped.length > 0) {
      this.logger.debug(
        `[LayoutReconstructor] Dropped ${dropped.length} of ${input.elements.length} element(s) before assignment`,
      );
    }

    const pageSize = { width: input.width, height: input.height };
    let profile: LayoutProfile | undefined;
    let layout: PageLayout;
    let strategy: AssignmentStrategy;

    const forced = this.selector.forcedStrategy;
    if (forced) {
      layout = describePageLayout(kept, pageSize);
      strategy = this.selector.get(forced);
      this.logger.info(
        `[LayoutReconstructor] Strategy ${forced} forced, profiling skipped`,
      );
    } else {
      profile = this.profiler.profile(kept, pageSize);
      layout = {
        pageWidth: profile.pageWidth,
        pageHeight: profile.pageHeight,
        topology: profile.topology,
      };
      strategy = this.selector.select(profile);
    }

    const partition = strategy.assign(kept, layout);
    const initial = GroupCollection.from(partition.groups);
    const validation = this.validator.validate(initial.toArray());

    let groups = initial;
    let correction: PageReconstruction['correction'];
    let finalValidation = validation;
    if (!validation.valid) {
      const outcome = this.corrector.correct(initial, validation);
      groups = outcome.collection;
      correction = outcome.result;
      finalValidation = this.validator.validate(groups.toArray());
    }

    this.logger.info(
      `[LayoutReconstructor] Page ${input.pageKey ?? '(unkeyed)'}: ${groups.size} group(s), ${partition.orphans.length} orphan(s) via ${strategy.name}${finalValidation.valid ? '' : ' (still invalid after correction)'}`,
    );

    const finalGroups = groups.toArray();
    return {
      pageKey: input.pageKey,
      layout,
      profile,
      strategy: strategy.name,
      initialGroups: initial.toArray(),
      groups: finalGroups,
      orphans: partition.orphans,
      validation,
      correction,
      finalValidation,
      audit: this.audit(finalGroups, validation, layout.pageHeight),
    };
  }

  private audit(
    groups: readonly LayoutGroup[],
    validation: ValidationResult,
    pageHeight: number,
  ): PageAudit {
    const abnormalGroupIds = this.validator.spatial
      .findAbnormalRanges(groups, pageHeight)
      .map((group) => group.id);
    if (abnormalGroupIds.length > 0) {
      this.logger.warn(
        `[LayoutReconstructor] Group(s) ${abnormalGroupIds.join(', ')} span more than a third of the page`,
      );
    }

    return {
      abnormalGroupIds,
      likelyMisreadGroupIds: SequenceValidator.reverseGaps(validation.gaps)
        .filter((gap) => SequenceValidator.isLikelyDigitMisread(gap))
        .flatMap((gap) =>
          gap.suspectGroupId === undefined ? [] : [gap.suspectGroupId],
        ),
      duplicateIdentifiers: this.validator.sequence.findDuplicates(groups),
    };
  }

  /**
   * Reconstruct every page of a document
   *
   * @returns Reconstructions in page order
   * @throws The abort reason when cancelled between pages
   */
  async reconstructDocument(
    pages: readonly PageInput[],
    options: ReconstructDocumentOptions = {},
  ): Promise<PageReconstruction[]> {
    const concurrency = options.concurrency ?? 1;
    this.logger.info(
      `[LayoutReconstructor] Reconstructing ${pages.length} page(s) with concurrency ${concurrency}`,
    );

    return ConcurrentPool.run(
      [...pages],
      concurrency,
      async (page) => this.reconstructPage(page),
      options.onPageComplete,
      options.abortSignal,
    );
  }

  /**
   * Persist a page reconstruction
   *
   * Commits of the same job are serialized; a duplicate key returns the
   * reconstruction committed first.
   *
   * @throws {ResourceTimeoutError} When the job lock is not acquired in time
   */
  async commitPage(
    jobId: string,
    pageKey: string,
    reconstruction: PageReconstruction,
    store: ReconstructionResultStore,
  ): Promise<CommitResult> {
    return this.locks.withLock(jobId, async () => {
      const { value, reusedExisting } = await executeIdempotentWrite(
        () => store.save(jobId, pageKey, reconstruction),
        () => store.load(jobId, pageKey),
        this.logger,
      );
      if (reusedExisting) {
        this.logger.info(
          `[LayoutReconstructor] Page ${pageKey} of job ${jobId} was already committed`,
        );
      }
      return { reconstruction: value, reusedExisting };
    });
  }
}
