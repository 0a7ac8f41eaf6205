import type { Issue, IssueType, Task } from '../types';

export function createIssue(
  type: IssueType,
  task: Task,
  annotationIds: string[],
  severity: number,
  explanation: string
): Issue {
  return Object.freeze({
    type,
    severity,
    annotations: Object.freeze([...annotationIds]),
    task: task.id,
    explanation,
  });
}
