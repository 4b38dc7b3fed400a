/**
 * Error handling and tracking utilities
 */

export class LeadPipelineError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LeadPipelineError';
  }
}

export class ConfigError extends LeadPipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

export class DataLoadError extends LeadPipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DATA_LOAD_ERROR', context);
    this.name = 'DataLoadError';
  }
}

export class ScannerError extends LeadPipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SCANNER_ERROR', context);
    this.name = 'ScannerError';
  }
}

/**
 * Error logger with context
 */
export function logError(error: Error, context?: Record<string, unknown>) {
  const timestamp = new Date().toISOString();
  const errorInfo = {
    timestamp,
    name: error.name,
    message: error.message,
    stack: error.stack,
    ...(error instanceof LeadPipelineError && { code: error.code, ...error.context }),
    ...context,
  };

  console.error('[ERROR]', JSON.stringify(errorInfo, null, 2));
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
