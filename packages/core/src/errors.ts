// ============================================================================
// Error Taxonomy
// ============================================================================

/**
 * Base error class for all extra-vars failures.
 * Provides consistent error structure with code and message.
 */
export class ExtraVarsError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ExtraVarsError';
  }

  toObject() {
    return { error: { code: this.code, message: this.message } };
  }
}

// ============================================================================
// Parse-layer errors (raised by the key=value parser)
// ============================================================================

export class MalformedAssignmentError extends ExtraVarsError {
  constructor(public readonly token: string) {
    super('MALFORMED_ASSIGNMENT', `Assignment '${token}' needs both a key and a value`);
    this.name = 'MalformedAssignmentError';
  }
}

export class SuspiciousTokenError extends ExtraVarsError {
  constructor(public readonly token: string) {
    super(
      'SUSPICIOUS_TOKEN',
      `Token '${token}' ends with ':' and looks like broken YAML or JSON`
    );
    this.name = 'SuspiciousTokenError';
  }
}

export class UnbalancedQuoteError extends ExtraVarsError {
  constructor(
    public readonly text: string,
    reason: 'quotation' | 'escape'
  ) {
    super(
      'UNBALANCED_QUOTE',
      reason === 'quotation' ? 'No closing quotation' : 'No escaped character'
    );
    this.name = 'UnbalancedQuoteError';
  }
}

// ============================================================================
// Source-level errors
// ============================================================================

/**
 * A source could not be decoded as YAML/JSON and the key=value fallback was
 * either disabled or failed too.
 */
export class ExtraVarsParseError extends ExtraVarsError {
  constructor(
    public readonly source: string,
    options?: ErrorOptions
  ) {
    super(
      'EXTRA_VARS_PARSE_ERROR',
      `Failed to parse some of the extra variables.\nvariables:\n${source}`,
      options
    );
    this.name = 'ExtraVarsParseError';
  }
}

export function isParseLayerError(err: unknown): err is ExtraVarsError {
  return (
    err instanceof MalformedAssignmentError ||
    err instanceof SuspiciousTokenError ||
    err instanceof UnbalancedQuoteError
  );
}
