import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { IssueType, PaletteEntry } from './types';

// ==========================================
// SCHEMA
// ==========================================

const RgbSchema = z.tuple([
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
]);

export const DEFAULT_PALETTE: PaletteEntry[] = [
  { name: 'white', rgb: [255, 255, 255] },
  { name: 'red', rgb: [255, 0, 0] },
  { name: 'green', rgb: [0, 255, 0] },
  { name: 'blue', rgb: [0, 0, 255] },
];

export const CHECK_NAMES = ['occlusion', 'stray_click', 'color', 'geometry'] as const satisfies readonly IssueType[];

export const DEFAULT_CHECKS: IssueType[] = ['occlusion', 'stray_click', 'color'];

export const EvaluatorConfigSchema = z.object({
  occlusionThreshold: z.number().min(0).max(100).default(40),
  // 'ordered' visits (i, j) and (j, i), flagging each overlapping pair twice
  occlusionPairMode: z.enum(['unordered', 'ordered']).default('unordered'),
  zeroOcclusionValue: z.string().default('0%'),
  strayClickMaxSize: z.number().min(0).default(5),
  trafficLightMaxAspectRatio: z.number().positive().default(0.55),
  nonVisibleFaceLabel: z.string().min(1).default('non_visible_face'),
  trafficControlSignLabel: z.string().min(1).default('traffic_control_sign'),
  notApplicableColor: z.string().min(1).default('not_applicable'),
  otherColor: z.string().min(1).default('other'),
  palette: z
    .array(z.object({ name: z.string().min(1), rgb: RgbSchema }))
    .min(1)
    .default(DEFAULT_PALETTE),
  maxHistogramColors: z.number().int().positive().default(256),
  severities: z
    .object({
      structural: z.number().int().default(10),
      colorSample: z.number().int().default(5),
    })
    .default({}),
  checks: z.array(z.enum(CHECK_NAMES)).min(1).default(DEFAULT_CHECKS),
  cacheImages: z.boolean().default(true),
  imageTimeoutMs: z.number().int().positive().default(4000),
  debug: z.boolean().default(false),
});

export type EvaluatorConfig = z.infer<typeof EvaluatorConfigSchema>;
export type EvaluatorConfigInput = z.input<typeof EvaluatorConfigSchema>;

// ==========================================
// LOADING
// ==========================================

export function resolveConfig(input: EvaluatorConfigInput = {}): EvaluatorConfig {
  const parsed = EvaluatorConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid evaluator configuration: ${details.join('; ')}`);
  }
  return parsed.data;
}

function parseFlag(value: string): boolean {
  return value === '1' || value === 'true' || value === 'yes';
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Defaults, then environment variables, then `overrides`. Unset variables keep the defaults.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EvaluatorConfigInput = {}
): EvaluatorConfig {
  const input: EvaluatorConfigInput = {};

  if (env.OCCLUSION_THRESHOLD) {
    input.occlusionThreshold = parseNumber('OCCLUSION_THRESHOLD', env.OCCLUSION_THRESHOLD);
  }
  if (env.OCCLUSION_PAIR_MODE) {
    const mode = env.OCCLUSION_PAIR_MODE;
    if (mode !== 'unordered' && mode !== 'ordered') {
      throw new ConfigurationError(`OCCLUSION_PAIR_MODE must be unordered or ordered, got "${mode}"`);
    }
    input.occlusionPairMode = mode;
  }
  if (env.STRAY_CLICK_MAX_SIZE) {
    input.strayClickMaxSize = parseNumber('STRAY_CLICK_MAX_SIZE', env.STRAY_CLICK_MAX_SIZE);
  }
  if (env.CHECKS) {
    input.checks = parseCheckList(env.CHECKS);
  }
  if (env.IMAGE_TIMEOUT_MS) {
    input.imageTimeoutMs = parseNumber('IMAGE_TIMEOUT_MS', env.IMAGE_TIMEOUT_MS);
  }
  if (env.CACHE_IMAGES) {
    input.cacheImages = parseFlag(env.CACHE_IMAGES);
  }
  if (env.DEBUG) {
    input.debug = parseFlag(env.DEBUG);
  }

  return resolveConfig({ ...input, ...overrides });
}

export function parseCheckList(value: string): IssueType[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);

  return names.map((name) => {
    const match = CHECK_NAMES.find((known) => known === name);
    if (!match) {
      throw new ConfigurationError(`Unknown check "${name}" (expected one of: ${CHECK_NAMES.join(', ')})`);
    }
    return match;
  });
}
