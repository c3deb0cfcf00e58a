/**
 * Custom Error Classes
 */

/**
 * Base error class for all jarpack errors
 */
export class JarpackError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'JarpackError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Invalid settings or build manifest
 */
export class ConfigurationError extends JarpackError {
  public readonly issues: ConfigurationIssue[];

  constructor(source: string, issues: ConfigurationIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super(
      `Invalid ${source}: ${summary}`,
      'CONFIGURATION_ERROR',
      { source, issues }
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Build manifest refers to something it does not define
 */
export class ManifestError extends JarpackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MANIFEST_ERROR', details);
    this.name = 'ManifestError';
  }
}

/**
 * Filesystem failure while building the layout
 */
export class PackIOError extends JarpackError {
  public readonly operation: string;
  public readonly path: string;

  constructor(operation: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to ${operation} ${path}: ${reason}`,
      'PACK_IO_ERROR',
      { operation, path },
      { cause }
    );
    this.name = 'PackIOError';
    this.operation = operation;
    this.path = path;
  }
}

/**
 * Template could not be read or rendered
 */
export class TemplateRenderError extends JarpackError {
  constructor(templatePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to render template ${templatePath}: ${reason}`,
      'TEMPLATE_RENDER_ERROR',
      { templatePath },
      { cause }
    );
    this.name = 'TemplateRenderError';
  }
}

/**
 * Archive could not be written; a partial file may remain
 */
export class ArchiveError extends JarpackError {
  constructor(archivePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to write archive ${archivePath}: ${reason}`,
      'ARCHIVE_ERROR',
      { archivePath },
      { cause }
    );
    this.name = 'ArchiveError';
  }
}

/**
 * Wrap any thrown value from a filesystem call in a PackIOError
 */
export async function withIO<T>(
  operation: string,
  path: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof JarpackError) {
      throw error;
    }
    throw new PackIOError(operation, path, error);
  }
}
