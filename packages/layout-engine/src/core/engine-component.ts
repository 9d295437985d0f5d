import type { LoggerMethods } from '@regroup/logger';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Abstract base class for engine components
 *
 * Provides consistent logging with a component name prefix.
 */
export abstract class EngineComponent {
  protected readonly logger: LoggerMethods;
  protected readonly componentName: string;

  /**
   * @param logger - Logger instance for logging
   * @param componentName - Name of the component for logging (e.g., "SequenceValidator")
   */
  constructor(logger: LoggerMethods, componentName: string) {
    this.logger = logger;
    this.componentName = componentName;
  }

  /**
   * Log a message with consistent component name prefix
   *
   * @param level - Log level
   * @param message - Message to log (without prefix)
   * @param args - Additional arguments to pass to logger
   */
  protected log(level: LogLevel, message: string, ...args: unknown[]): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }
}
