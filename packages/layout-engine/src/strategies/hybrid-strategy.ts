import type { LoggerMethods } from '@regroup/logger';
import type {
  LayoutElement,
  LayoutPartition,
  PageLayout,
} from '@regroup/model';

import type { AssignmentStrategy } from './assignment-strategy';

import { EngineComponent } from '../core/engine-component';
import { partitionLabels, scoreGrouping } from './grouping-penalty';

/**
 * Both candidate partitions with their penalties
 */
export interface HybridOutcome {
  partition: LayoutPartition;
  chosen: 'direct' | 'legacy-local';
  directPenalty: number;
  legacyLocalPenalty: number;
}

/**
 * HybridStrategy
 *
 * The `hybrid` strategy. Runs the direct and legacy-local strategies on the
 * same elements and keeps the partition with the lower grouping penalty.
 * Equal penalties keep the direct result.
 */
export class HybridStrategy
  extends EngineComponent
  implements AssignmentStrategy
{
  readonly name = 'hybrid';

  private readonly direct: AssignmentStrategy;
  private readonly legacyLocal: AssignmentStrategy;

  constructor(
    logger: LoggerMethods,
    direct: AssignmentStrategy,
    legacyLocal: AssignmentStrategy,
  ) {
    super(logger, 'HybridStrategy');
    this.direct = direct;
    this.legacyLocal = legacyLocal;
  }

  assign(
    elements: readonly LayoutElement[],
    layout: PageLayout,
  ): LayoutPartition {
    return this.assignWithScores(elements, layout).partition;
  }

  /**
   * Run both strategies and report both penalties
   */
  assignWithScores(
    elements: readonly LayoutElement[],
    layout: PageLayout,
  ): HybridOutcome {
    const directPartition = this.direct.assign(elements, layout);
    const legacyLocalPartition = this.legacyLocal.assign(elements, layout);

    const directPenalty = scoreGrouping(
      elements,
      partitionLabels(directPartition),
      layout.pageWidth,
    );
    const legacyLocalPenalty = scoreGrouping(
      elements,
      partitionLabels(legacyLocalPartition),
      layout.pageWidth,
    );

    const chosen =
      directPenalty <= legacyLocalPenalty ? 'direct' : 'legacy-local';
    this.log(
      'info',
      `Penalties: direct=${directPenalty.toFixed(3)}, legacy-local=${legacyLocalPenalty.toFixed(3)}; keeping ${chosen}`,
    );

    return {
      partition: chosen === 'direct' ? directPartition : legacyLocalPartition,
      chosen,
      directPenalty,
      legacyLocalPenalty,
    };
  }
}
