import type { EvaluatorConfig } from '../config';
import { occlusionPercentage } from '../geometry';
import { createLogger, type Logger } from '../logger';
import type { Annotation, Check, Issue, Task } from '../types';
import { createIssue } from './issue';

export type OcclusionCheckOptions = Pick<
  EvaluatorConfig,
  'occlusionThreshold' | 'occlusionPairMode' | 'zeroOcclusionValue' | 'severities' | 'debug'
>;

/**
 * Flags pairs of boxes that overlap noticeably while both annotators
 * claimed the object was not occluded at all.
 */
export class OcclusionConsistencyCheck implements Check {
  readonly name = 'occlusion';
  private options: OcclusionCheckOptions;
  private logger: Logger;

  constructor(options: OcclusionCheckOptions) {
    this.options = options;
    this.logger = createLogger('OcclusionCheck', options.debug);
  }

  async evaluate(task: Task): Promise<Issue[]> {
    const issues: Issue[] = [];

    for (const [first, second] of this.pairs(task.annotations)) {
      if (!this.claimsNoOcclusion(first) || !this.claimsNoOcclusion(second)) continue;

      const percentage = occlusionPercentage(first, second);
      if (percentage === null) {
        this.logger.warn(`Task ${task.id}: skipped pair ${first.id} / ${second.id} (degenerate geometry)`);
        continue;
      }

      if (percentage > this.options.occlusionThreshold) {
        issues.push(
          createIssue(
            'occlusion',
            task,
            [first.id, second.id],
            this.options.severities.structural,
            'Potential for occlusion yet marked as 0%'
          )
        );
      }
    }

    return issues;
  }

  private claimsNoOcclusion(annotation: Annotation): boolean {
    return annotation.attributes.occlusion === this.options.zeroOcclusionValue;
  }

  private *pairs(annotations: readonly Annotation[]): Generator<[Annotation, Annotation]> {
    const ordered = this.options.occlusionPairMode === 'ordered';
    for (let i = 0; i < annotations.length; i++) {
      for (let j = ordered ? 0 : i + 1; j < annotations.length; j++) {
        if (i === j) continue;
        yield [annotations[i], annotations[j]];
      }
    }
  }
}
