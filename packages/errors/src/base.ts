import { ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * Plain-object form of an {@link ErrtallyError}.
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
}

/**
 * Base class for every error the errtally packages throw.
 *
 * Subclasses pin `code` to a catalog key; domain, title and expectedness
 * are read back from {@link ERROR_CATALOG}.
 */
export abstract class ErrtallyError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get title(): string {
    return ERROR_CATALOG[this.code].title;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/**
 * Check if a value is any errtally error.
 */
export function isErrtallyError(error: unknown): error is ErrtallyError {
  return error instanceof ErrtallyError;
}
