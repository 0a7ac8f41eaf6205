// ==========================================
// ERROR TYPES
// ==========================================

export type AuditErrorCode =
  | 'CONFIGURATION'
  | 'IMAGE_FETCH'
  | 'TASK_SOURCE'
  | 'TASK_FORMAT';

export class AuditError extends Error {
  readonly code: AuditErrorCode;

  constructor(code: AuditErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuditError';
    this.code = code;
  }
}

/** Missing credentials or invalid evaluator configuration. */
export class ConfigurationError extends AuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The task image could not be retrieved or decoded. Aborts the whole
 * evaluation: a report missing some color findings would look clean.
 */
export class ImageFetchError extends AuditError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super('IMAGE_FETCH', message, { cause: options?.cause });
    this.name = 'ImageFetchError';
    this.url = url;
    this.status = options?.status;
  }
}

export class TaskSourceError extends AuditError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('TASK_SOURCE', message, { cause: options?.cause });
    this.name = 'TaskSourceError';
    this.status = options?.status;
  }
}

export class TaskFormatError extends AuditError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('TASK_FORMAT', message);
    this.name = 'TaskFormatError';
    this.details = details;
  }
}

// ==========================================
// FORMATTING
// ==========================================

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [];
    parts.push(`${error.name || 'Error'}: ${error.message || String(error)}`);
    if (error instanceof AuditError) parts.push(`code=${error.code}`);
    if (
      (error instanceof ImageFetchError || error instanceof TaskSourceError) &&
      error.status !== undefined
    ) {
      parts.push(`status=${error.status}`);
    }
    if (error instanceof ImageFetchError) parts.push(`url=${error.url}`);
    if (error instanceof TaskFormatError && error.details.length > 0) {
      parts.push(`details=${error.details.join('; ')}`);
    }
    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
