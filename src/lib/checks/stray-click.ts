import type { EvaluatorConfig } from '../config';
import type { Annotation, Check, Issue, Task } from '../types';
import { createIssue } from './issue';

export type StrayClickCheckOptions = Pick<EvaluatorConfig, 'strayClickMaxSize' | 'severities'>;

// Tiny boxes, or boxes with sub-pixel sizes, are usually accidental clicks
export class StrayClickCheck implements Check {
  readonly name = 'stray_click';
  private options: StrayClickCheckOptions;

  constructor(options: StrayClickCheckOptions) {
    this.options = options;
  }

  async evaluate(task: Task): Promise<Issue[]> {
    return task.annotations
      .filter((annotation) => this.isStrayClick(annotation))
      .map((annotation) =>
        createIssue('stray_click', task, [annotation.id], this.options.severities.structural, 'Stray click')
      );
  }

  isStrayClick({ width, height }: Annotation): boolean {
    const max = this.options.strayClickMaxSize;
    const tiny = width <= max && height <= max;
    return tiny || !Number.isInteger(width) || !Number.isInteger(height);
  }
}
