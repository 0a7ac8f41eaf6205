import type { EvaluatorConfig } from '../config';
import { isZeroArea } from '../geometry';
import type { Check, Issue, Task } from '../types';
import { createIssue } from './issue';

export type GeometryCheckOptions = Pick<EvaluatorConfig, 'severities'>;

/**
 * Reports boxes that cover no whole pixel on some axis. The occlusion check
 * skips these, so this is where they surface.
 */
export class GeometryCheck implements Check {
  readonly name = 'geometry';
  private options: GeometryCheckOptions;

  constructor(options: GeometryCheckOptions) {
    this.options = options;
  }

  async evaluate(task: Task): Promise<Issue[]> {
    return task.annotations
      .filter((annotation) => isZeroArea(annotation))
      .map((annotation) =>
        createIssue('geometry', task, [annotation.id], this.options.severities.structural, 'Zero-area bounding box')
      );
  }
}
