import { z } from 'zod';
import fs from 'fs/promises';
import { ConfigurationError, TaskFormatError, TaskSourceError } from './errors';
import { createLogger, type Logger } from './logger';
import type { Task } from './types';

// ==========================================
// WIRE SCHEMAS
// ==========================================

const WireAnnotationSchema = z.object({
  uuid: z.string().min(1),
  label: z.string(),
  left: z.number(),
  top: z.number(),
  width: z.number(),
  height: z.number(),
  attributes: z
    .object({
      occlusion: z.string(),
      background_color: z.string(),
    })
    .passthrough(),
});

const WireTaskSchema = z.object({
  task_id: z.union([z.string().min(1), z.number()]),
  params: z.object({
    attachment: z.string().min(1),
  }),
  response: z
    .object({
      annotations: z.array(WireAnnotationSchema),
    })
    .nullish(),
});

const WireTaskListSchema = z.array(WireTaskSchema);

const WirePageSchema = z.object({
  docs: z.array(WireTaskSchema),
  next_token: z.string().nullish(),
});

export type WireTask = z.infer<typeof WireTaskSchema>;

// ==========================================
// MAPPING
// ==========================================

export function toTask(wire: WireTask): Task {
  return {
    id: wire.task_id,
    imageUrl: wire.params.attachment,
    annotations: (wire.response?.annotations ?? []).map((annotation) => ({
      id: annotation.uuid,
      label: annotation.label,
      left: annotation.left,
      top: annotation.top,
      width: annotation.width,
      height: annotation.height,
      attributes: annotation.attributes,
    })),
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Accepts a bare array of tasks or a `{ docs: [...] }` page as returned by the platform API.
 */
export function parseTasks(payload: unknown): Task[] {
  const parsed = Array.isArray(payload)
    ? WireTaskListSchema.safeParse(payload)
    : WirePageSchema.transform((page) => page.docs).safeParse(payload);
  if (!parsed.success) {
    throw new TaskFormatError('Task payload does not match the expected shape', formatIssues(parsed.error));
  }
  return parsed.data.map(toTask);
}

export async function loadTasksFromFile(filePath: string): Promise<Task[]> {
  const raw = await fs.readFile(filePath, 'utf-8');
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new TaskFormatError(
      `${filePath} is not valid JSON`,
      [error instanceof Error ? error.message : String(error)]
    );
  }
  return parseTasks(payload);
}

// ==========================================
// REMOTE PLATFORM CLIENT
// ==========================================

export type AnnotationPlatformClientOptions = {
  apiKey: string | undefined;
  baseUrl?: string;
  fetchFn?: typeof fetch;
  debug?: boolean;
};

export type ListTasksOptions = {
  project?: string;
  status?: string;
  /** Stop after this many tasks */
  limit?: number;
};

export const DEFAULT_API_URL = 'https://api.scale.com/v1';

/**
 * Minimal read-only client for the annotation platform's task listing.
 * No retries: a failed page fails the listing.
 */
export class AnnotationPlatformClient {
  private apiKey: string;
  private baseUrl: string;
  private fetchFn: typeof fetch;
  private logger: Logger;

  constructor(options: AnnotationPlatformClientOptions) {
    if (!options.apiKey || !options.apiKey.trim()) {
      throw new ConfigurationError('No API key provided');
    }
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? fetch;
    this.logger = createLogger('PlatformClient', options.debug ?? false);
  }

  async listTasks(options: ListTasksOptions = {}): Promise<Task[]> {
    const tasks: Task[] = [];
    let nextToken: string | undefined;

    do {
      const page = await this.fetchPage(options, nextToken);
      for (const wire of page.docs) {
        tasks.push(toTask(wire));
      }
      nextToken = page.next_token ?? undefined;
      this.logger.debug(`Fetched ${page.docs.length} tasks (total ${tasks.length})`);
    } while (nextToken && (options.limit === undefined || tasks.length < options.limit));

    return options.limit === undefined ? tasks : tasks.slice(0, options.limit);
  }

  private async fetchPage(options: ListTasksOptions, nextToken: string | undefined) {
    const url = new URL(`${this.baseUrl}/tasks`);
    if (options.project) url.searchParams.set('project', options.project);
    if (options.status) url.searchParams.set('status', options.status);
    if (options.limit !== undefined) url.searchParams.set('limit', String(Math.min(options.limit, 100)));
    if (nextToken) url.searchParams.set('next_token', nextToken);

    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), {
        headers: {
          Authorization: `Basic ${Buffer.from(`${this.apiKey}:`).toString('base64')}`,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      throw new TaskSourceError('Task listing request failed', { cause: error });
    }

    if (!response.ok) {
      throw new TaskSourceError(`Task listing failed: HTTP ${response.status}`, { status: response.status });
    }

    const parsed = WirePageSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TaskFormatError('Task listing page does not match the expected shape', formatIssues(parsed.error));
    }
    return parsed.data;
  }
}
