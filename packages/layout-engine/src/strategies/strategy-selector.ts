import type { LoggerMethods } from '@regroup/logger';
import type { LayoutProfile, StrategyName } from '@regroup/model';

import type { EngineOptions } from '../config/engine-options';
import type { AssignmentStrategy } from './assignment-strategy';

import { EngineComponent } from '../core/engine-component';
import { SpatialPartitioner } from '../partition/spatial-partitioner';
import { HybridStrategy } from './hybrid-strategy';
import { LegacyLocalStrategy } from './legacy-local-strategy';

/**
 * StrategySelector
 *
 * Owns one instance of each assignment strategy and picks the one to run
 * for a page: the configured forced strategy, otherwise the profile's
 * recommendation.
 */
export class StrategySelector extends EngineComponent {
  private readonly strategies: Record<StrategyName, AssignmentStrategy>;
  private readonly forced: StrategyName | undefined;

  constructor(logger: LoggerMethods, options: EngineOptions) {
    super(logger, 'StrategySelector');

    const direct = new SpatialPartitioner(logger, options);
    const legacyLocal = new LegacyLocalStrategy(logger, options);
    this.strategies = {
      direct,
      'legacy-local': legacyLocal,
      hybrid: new HybridStrategy(logger, direct, legacyLocal),
    };
    this.forced = options.forcedStrategy;
  }

  /**
   * Strategy configured to bypass profiling, if any
   */
  get forcedStrategy(): StrategyName | undefined {
    return this.forced;
  }

  /**
   * Pick the strategy for a profiled page
   */
  select(profile: LayoutProfile): AssignmentStrategy {
    if (this.forced) {
      this.log('info', `Using forced strategy ${this.forced}`);
      return this.strategies[this.forced];
    }

    this.log(
      'info',
      `Using ${profile.recommendedStrategy} recommended for ${profile.topology} layout`,
    );
    return this.strategies[profile.recommendedStrategy];
  }

  get(name: StrategyName): AssignmentStrategy {
    return this.strategies[name];
  }
}
