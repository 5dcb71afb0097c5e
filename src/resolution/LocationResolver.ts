/**
 * LocationResolver Class
 * Runs the detection strategies in priority order and returns the first candidate
 * that passes directory validation. Every strategy gets its own time budget.
 */

import type {
  DetectionAttempt,
  DetectionOutcome,
  LocationStrategy,
  ValidatedPath
} from '../types/index';
import { PathValidator } from '../security/PathValidator';
import { StrategyTimeoutError, errorMessage } from '../errors/LauncherErrors';
import { Logger } from '../logging/Logger';

export const DEFAULT_STRATEGY_TIMEOUT_MS = 6000;

export interface LocationResolverOptions {
  strategyTimeoutMs?: number;
  clock?: () => number;
}

export interface ResolutionReport {
  directory: ValidatedPath | null;
  attempts: DetectionAttempt[];
}

export class LocationResolver {
  private readonly strategyTimeoutMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private lastAttempts: DetectionAttempt[] = [];

  constructor(
    private readonly strategies: readonly LocationStrategy[],
    private readonly pathValidator: PathValidator,
    options: LocationResolverOptions = {},
    logger?: Logger
  ) {
    this.strategyTimeoutMs = options.strategyTimeoutMs ?? DEFAULT_STRATEGY_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
    this.logger = logger ?? Logger.createDefault('LocationResolver');
  }

  public async resolve(): Promise<ValidatedPath | null> {
    const report = await this.resolveWithDiagnostics();
    return report.directory;
  }

  public async resolveWithDiagnostics(): Promise<ResolutionReport> {
    const attempts: DetectionAttempt[] = [];
    let directory: ValidatedPath | null = null;

    for (const strategy of this.strategies) {
      const startedAt = this.clock();
      const outcome = await this.runStrategy(strategy);

      let validated: ValidatedPath | null = null;
      let recorded: DetectionOutcome = outcome;
      if (outcome.status === 'found') {
        const validation = this.pathValidator.validateDirectory(outcome.path);
        if (validation.isValid) {
          validated = validation.validated;
        } else {
          recorded = { status: 'error', reason: `InvalidPath: ${validation.error}` };
        }
      }

      const attempt: DetectionAttempt = {
        strategy: strategy.name,
        elapsedMs: this.clock() - startedAt,
        outcome: recorded
      };
      attempts.push(attempt);
      this.logger.debug('Detection attempt', { ...attempt });

      if (validated) {
        directory = validated;
        break;
      }
    }

    this.lastAttempts = attempts;
    if (directory) {
      this.logger.info(`Resolved active folder: ${directory.path}`);
    } else {
      this.logger.info('No strategy produced a valid folder');
    }

    return { directory, attempts };
  }

  public getLastAttempts(): DetectionAttempt[] {
    return [...this.lastAttempts];
  }

  public getStrategyNames(): string[] {
    return this.strategies.map(strategy => strategy.name);
  }

  private async runStrategy(strategy: LocationStrategy): Promise<DetectionOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new StrategyTimeoutError(strategy.name, this.strategyTimeoutMs)),
        this.strategyTimeoutMs
      );
    });

    try {
      const candidate = await Promise.race([strategy.detect(), timeout]);
      return candidate ? { status: 'found', path: candidate } : { status: 'not_found' };
    } catch (error) {
      const reason = errorMessage(error);
      return { status: 'error', reason };
    } finally {
      clearTimeout(timer);
    }
  }
}
