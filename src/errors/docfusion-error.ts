/**
 * DocFusion Typed Error Hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export class DocFusionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocFusionError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A recognition engine call failed (network, service or SDK error). */
export class AdapterError extends DocFusionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ADAPTER_ERROR', context);
    this.name = 'AdapterError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RecognitionTimeoutError extends DocFusionError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'TIMEOUT', context);
    this.name = 'RecognitionTimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnitProcessingError extends DocFusionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'UNIT_ERROR', context);
    this.name = 'UnitProcessingError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends DocFusionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AuthenticationError extends DocFusionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTH_ERROR', context);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedInputError extends DocFusionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'UNSUPPORTED_INPUT', context);
    this.name = 'UnsupportedInputError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends DocFusionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
