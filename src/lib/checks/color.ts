import { closestPaletteColor, colorHistogram, cropPixels, dominantColors } from '../colors';
import type { EvaluatorConfig } from '../config';
import type { ImageFetcher } from '../image-fetcher';
import { createLogger, type Logger } from '../logger';
import type { Annotation, Check, Issue, PixelBuffer, Task } from '../types';
import { createIssue } from './issue';

export type ColorCheckOptions = Pick<
  EvaluatorConfig,
  | 'nonVisibleFaceLabel'
  | 'trafficControlSignLabel'
  | 'trafficLightMaxAspectRatio'
  | 'notApplicableColor'
  | 'otherColor'
  | 'palette'
  | 'maxHistogramColors'
  | 'severities'
  | 'cacheImages'
  | 'debug'
>;

type ColorFinding = {
  severity: number;
  explanation: string;
};

type ImageLoader = () => Promise<PixelBuffer>;

/**
 * Cross-checks each annotation's declared background color against its label
 * and, for palette colors, against the pixels inside its box.
 */
export class ColorConsistencyCheck implements Check {
  readonly name = 'color';
  private options: ColorCheckOptions;
  private fetcher: ImageFetcher;
  private logger: Logger;

  constructor(options: ColorCheckOptions, fetcher: ImageFetcher) {
    this.options = options;
    this.fetcher = fetcher;
    this.logger = createLogger('ColorCheck', options.debug);
  }

  async evaluate(task: Task): Promise<Issue[]> {
    const issues: Issue[] = [];
    const loadImage = this.imageLoader(task);

    for (const annotation of task.annotations) {
      const finding = await this.inspect(annotation, loadImage);
      if (finding) {
        issues.push(createIssue('color', task, [annotation.id], finding.severity, finding.explanation));
      }
    }

    return issues;
  }

  private async inspect(annotation: Annotation, loadImage: ImageLoader): Promise<ColorFinding | null> {
    const { options } = this;
    const color = annotation.attributes.background_color;
    const isNonVisibleFace = annotation.label === options.nonVisibleFaceLabel;
    const structural = options.severities.structural;

    if (color !== options.notApplicableColor && isNonVisibleFace) {
      return { severity: structural, explanation: 'Incorrect color labelled for non_visible_face' };
    }
    if (color === options.notApplicableColor && !isNonVisibleFace) {
      return { severity: structural, explanation: 'Incorrect object labelled with not_applicable color' };
    }
    if (
      annotation.label === options.trafficControlSignLabel &&
      this.isTrafficLightShaped(annotation) &&
      color !== options.otherColor
    ) {
      return { severity: structural, explanation: 'Traffic light labelled with a color' };
    }
    if (options.palette.some((entry) => entry.name === color)) {
      const matches = await this.matchesSampledColors(annotation, color, loadImage);
      if (!matches) {
        return { severity: options.severities.colorSample, explanation: 'Potential color issue' };
      }
    }

    return null;
  }

  // Tall, narrow boxes. A box without positive height never counts.
  private isTrafficLightShaped({ width, height }: Annotation): boolean {
    return height > 0 && width / height < this.options.trafficLightMaxAspectRatio;
  }

  /**
   * True when either of the two most frequent colors in the box classifies to
   * `declared`, or when the box gives no usable histogram.
   */
  private async matchesSampledColors(
    annotation: Annotation,
    declared: string,
    loadImage: ImageLoader
  ): Promise<boolean> {
    const image = await loadImage();
    const crop = cropPixels(image, {
      left: annotation.left,
      top: annotation.top,
      right: annotation.left + annotation.width,
      bottom: annotation.top + annotation.height,
    });

    const histogram = colorHistogram(crop, this.options.maxHistogramColors);
    if (!histogram || histogram.length === 0) {
      this.logger.debug(`${annotation.id}: no color histogram (${crop.width}x${crop.height} crop)`);
      return true;
    }

    const sampled = dominantColors(histogram, 2).map((entry) =>
      closestPaletteColor(entry.rgb, this.options.palette)
    );
    this.logger.debug(`${annotation.id}: declared ${declared}, sampled ${sampled.join(', ')}`);
    return sampled.includes(declared);
  }

  private imageLoader(task: Task): ImageLoader {
    if (!this.options.cacheImages) {
      return () => this.fetcher.fetchImage(task.imageUrl);
    }

    let pending: Promise<PixelBuffer> | null = null;
    return () => {
      if (!pending) {
        pending = this.fetcher.fetchImage(task.imageUrl);
      }
      return pending;
    };
  }
}
