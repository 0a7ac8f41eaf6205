import type { EvaluatorConfig } from '../config';
import type { ImageFetcher } from '../image-fetcher';
import type { Check, IssueType } from '../types';
import { ColorConsistencyCheck } from './color';
import { GeometryCheck } from './geometry';
import { OcclusionConsistencyCheck } from './occlusion';
import { StrayClickCheck } from './stray-click';

export { ColorConsistencyCheck } from './color';
export { GeometryCheck } from './geometry';
export { OcclusionConsistencyCheck } from './occlusion';
export { StrayClickCheck } from './stray-click';
export { createIssue } from './issue';

export function createCheck(name: IssueType, config: EvaluatorConfig, fetcher: ImageFetcher): Check {
  switch (name) {
    case 'occlusion':
      return new OcclusionConsistencyCheck(config);
    case 'stray_click':
      return new StrayClickCheck(config);
    case 'color':
      return new ColorConsistencyCheck(config, fetcher);
    case 'geometry':
      return new GeometryCheck(config);
  }
}

/** Instantiate the configured checks, in configuration order. */
export function createChecks(config: EvaluatorConfig, fetcher: ImageFetcher): Check[] {
  return config.checks.map((name) => createCheck(name, config, fetcher));
}
