export type BulletinErrorCode =
  | "RETRIEVAL_FAILURE"
  | "DELIVERY_FAILURE"
  | "CONFIG_ERROR";

export class BulletinError extends Error {
  readonly code: BulletinErrorCode;

  constructor(code: BulletinErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Network or parse failure inside a source adapter.
 */
export class RetrievalFailure extends BulletinError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("RETRIEVAL_FAILURE", `${source}: ${message}`, options);
    this.source = source;
  }
}

export class DeliveryFailure extends BulletinError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("DELIVERY_FAILURE", message, options);
    this.status = status;
  }
}

export class ConfigError extends BulletinError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIG_ERROR", message);
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
