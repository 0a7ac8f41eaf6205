import { createChecks } from './checks';
import { resolveConfig, type EvaluatorConfig, type EvaluatorConfigInput } from './config';
import { HttpImageFetcher, type ImageFetcher } from './image-fetcher';
import { createLogger, type Logger } from './logger';
import type { Check, Issue, Report, Task } from './types';

export type EvaluatorOptions = {
  config?: EvaluatorConfigInput;
  /** Image source for the color check (default: HTTP fetch + sharp decode) */
  fetcher?: ImageFetcher;
  /** Replace the configured checks entirely */
  checks?: Check[];
};

/**
 * Runs every check over every task and collects the findings into one report.
 *
 * Checks run one after another and never see each other's output. An error
 * thrown by a check (e.g. an image that cannot be fetched) rejects the whole
 * evaluation; there is no partial report.
 */
export class TaskBatchEvaluator {
  readonly config: EvaluatorConfig;
  private checks: Check[];
  private logger: Logger;

  constructor(options: EvaluatorOptions = {}) {
    this.config = resolveConfig(options.config);
    const fetcher =
      options.fetcher ??
      new HttpImageFetcher({ timeoutMs: this.config.imageTimeoutMs, debug: this.config.debug });
    this.checks = options.checks ?? createChecks(this.config, fetcher);
    this.logger = createLogger('Evaluator', this.config.debug);
  }

  get checkNames() {
    return this.checks.map((check) => check.name);
  }

  async evaluate(tasks: readonly Task[] = []): Promise<Report> {
    const flagged: Issue[] = [];

    for (const task of tasks) {
      const before = flagged.length;
      for (const check of this.checks) {
        // A dense task can return more issues than push(...spread) takes as arguments.
        for (const issue of await check.evaluate(task)) {
          flagged.push(issue);
        }
      }
      this.logger.debug(
        `Task ${task.id}: ${task.annotations.length} annotations, ${flagged.length - before} issues`
      );
    }

    return {
      count: flagged.length,
      types: this.checkNames,
      flagged,
    };
  }
}

export async function evaluateTasks(tasks: readonly Task[], options: EvaluatorOptions = {}): Promise<Report> {
  return new TaskBatchEvaluator(options).evaluate(tasks);
}
