export type ReportErrorCode =
  | 'COLLECTION_FAILED'
  | 'SOURCE_SKIPPED'
  | 'RENDER_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'DELIVERY_FAILED'
  | 'INVALID_CONFIG';

export class ReportError extends Error {
  readonly code: ReportErrorCode;

  constructor(message: string, code: ReportErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReportError';
    this.code = code;
  }
}

/**
 * One repository or telemetry source was skipped. Collectors record these
 * and keep going; they are never thrown.
 */
export class CollectionWarning extends ReportError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(message, 'SOURCE_SKIPPED', options);
    this.name = 'CollectionWarning';
    this.source = source;
  }
}

export class CollectionError extends ReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'COLLECTION_FAILED', options);
    this.name = 'CollectionError';
  }
}

export class RenderError extends ReportError {
  constructor(message: string) {
    super(message, 'RENDER_FAILED');
    this.name = 'RenderError';
  }
}

export class AuthenticationError extends ReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'AUTHENTICATION_FAILED', options);
    this.name = 'AuthenticationError';
  }
}

export class DeliveryError extends ReportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DELIVERY_FAILED', options);
    this.name = 'DeliveryError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends ReportError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    const message = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join(', ');
    super(`Configuration validation failed: ${message}`, 'INVALID_CONFIG');
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
