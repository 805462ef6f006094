/**
 * @module errors
 * Structured error types, error code registry, and the last-error slot.
 *
 * Control-surface functions report failure through return codes or
 * `false`; the message explaining the most recent failure is kept in a
 * process-wide slot readable through {@link getLastError}.
 */

// =====================================================================
// Error Code Union & Enums
// =====================================================================

/** All known accord error codes. */
export type AccordErrorCode =
  | 'PARSE_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'BIND_FAILURE'
  | 'TLS_CONFIG_FAILURE'
  | 'INVALID_PACT'
  | 'PROVIDER_CONNECTION_ERROR'
  | 'INTERNAL_FAULT'
  | 'NOT_FOUND'
  | 'PACT_FILE_CONFLICT'
  | 'IO_ERROR'
  | 'INVALID_ARGUMENTS';

/** Broad classification of error origin. */
export type ErrorCategory = 'input' | 'network' | 'state' | 'system';

/** Impact severity. */
export type ErrorSeverity = 'fatal' | 'recoverable' | 'warning';

/** Machine-readable error object. */
export interface StructuredError {
  code: AccordErrorCode;
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  details: Record<string, unknown>;
  suggestedActions: string[];
  timestamp: number;
}

// =====================================================================
// Error Metadata Registry
// =====================================================================

interface ErrorMetadataEntry {
  category: ErrorCategory;
  defaultSeverity: ErrorSeverity;
  suggestedActions: string[];
}

/** Default classification and recovery hints for every error code. */
export const ERROR_METADATA: ReadonlyMap<AccordErrorCode, ErrorMetadataEntry> = new Map<AccordErrorCode, ErrorMetadataEntry>([
  ['PARSE_ERROR', {
    category: 'input',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Check the matcher expression syntax', 'Quote string arguments with single quotes'],
  }],
  ['CONFIGURATION_ERROR', {
    category: 'state',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Configure interactions before starting the mock server', 'Check the handle is still valid'],
  }],
  ['BIND_FAILURE', {
    category: 'network',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Use port 0 for an OS-assigned port', 'Stop the process holding the port'],
  }],
  ['TLS_CONFIG_FAILURE', {
    category: 'system',
    defaultSeverity: 'fatal',
    suggestedActions: ['Set mockServer.tls.key and mockServer.tls.cert', 'Check the PEM files are readable'],
  }],
  ['INVALID_PACT', {
    category: 'input',
    defaultSeverity: 'fatal',
    suggestedActions: ['Validate the pact file with `accord validate`', 'Check consumer and provider names are present'],
  }],
  ['PROVIDER_CONNECTION_ERROR', {
    category: 'network',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Check the provider is running', 'Verify provider host, port and base path', 'Increase the verifier timeout'],
  }],
  ['INTERNAL_FAULT', {
    category: 'system',
    defaultSeverity: 'fatal',
    suggestedActions: ['Re-run with logLevel debug', 'Report the failing input'],
  }],
  ['NOT_FOUND', {
    category: 'state',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Check the handle or port was not already released'],
  }],
  ['PACT_FILE_CONFLICT', {
    category: 'state',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Write with overwrite enabled', 'Remove the stale pact file', 'Give conflicting interactions distinct descriptions'],
  }],
  ['IO_ERROR', {
    category: 'system',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Check the directory exists and is writable'],
  }],
  ['INVALID_ARGUMENTS', {
    category: 'input',
    defaultSeverity: 'recoverable',
    suggestedActions: ['Run `accord verify --help` for the accepted options'],
  }],
]);

// =====================================================================
// Factory Function
// =====================================================================

/**
 * Create a complete StructuredError from an error code.
 *
 * @param severityOverride - Override the default severity from the registry
 */
export function createStructuredError(
  code: AccordErrorCode,
  message: string,
  details: Record<string, unknown> = {},
  severityOverride?: ErrorSeverity,
): StructuredError {
  const metadata = ERROR_METADATA.get(code);
  return {
    code,
    category: metadata?.category ?? 'system',
    severity: severityOverride ?? metadata?.defaultSeverity ?? 'fatal',
    message,
    details,
    suggestedActions: metadata ? [...metadata.suggestedActions] : [],
    timestamp: Date.now(),
  };
}

// =====================================================================
// AccordError Class
// =====================================================================

/** Error subclass wrapping a StructuredError for throw/catch patterns. */
export class AccordError extends Error {
  public readonly structuredError: StructuredError;

  constructor(
    code: AccordErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    severityOverride?: ErrorSeverity,
  ) {
    super(message);
    this.name = 'AccordError';
    this.structuredError = createStructuredError(code, message, details, severityOverride);
  }

  toJSON(): StructuredError {
    return this.structuredError;
  }

  get code(): AccordErrorCode {
    return this.structuredError.code;
  }

  get category(): ErrorCategory {
    return this.structuredError.category;
  }

  get severity(): ErrorSeverity {
    return this.structuredError.severity;
  }
}

// =====================================================================
// Last error
// =====================================================================

let lastError: StructuredError | undefined;

/** Record the reason for the most recent failed call. */
export function setLastError(code: AccordErrorCode, message: string, details: Record<string, unknown> = {}): void {
  lastError = createStructuredError(code, message, details);
}

/** Message of the most recent failure, if any. */
export function getLastError(): string | undefined {
  return lastError?.message;
}

export function getLastStructuredError(): StructuredError | undefined {
  return lastError;
}

export function clearLastError(): void {
  lastError = undefined;
}
