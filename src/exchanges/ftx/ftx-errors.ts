export type FtxErrorKind =
  | 'credentials'
  | 'transport'
  | 'malformed-response'
  | 'exchange'
  | 'empty-selection';

/**
 * Base class for every failure raised by the FTX client.
 * Callers branch on `kind` (or `instanceof`) to tell failures apart.
 */
export abstract class FtxError extends Error {
  abstract readonly kind: FtxErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * API key or secret missing, empty or not a string
 */
export class FtxCredentialsError extends FtxError {
  readonly kind = 'credentials';
}

/**
 * Response body could not be parsed as JSON
 */
export class FtxTransportError extends FtxError {
  readonly kind = 'transport';

  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
  }
}

/**
 * JSON that is not a response envelope, or a result of the wrong shape
 */
export class FtxResponseError extends FtxError {
  readonly kind = 'malformed-response';

  constructor(
    message: string,
    readonly endpoint: string
  ) {
    super(message);
  }
}

/**
 * Envelope with `success: false`. The message is the exchange's own error string.
 */
export class FtxApiError extends FtxError {
  readonly kind = 'exchange';

  constructor(
    message: string,
    readonly status: number,
    readonly endpoint: string
  ) {
    super(message);
  }
}

export class FtxNoFutureError extends FtxError {
  readonly kind = 'empty-selection';

  constructor(readonly underlying: string) {
    super(`No enabled and non-expired future found for underlying ${underlying}`);
  }
}

export function isFtxError(error: unknown): error is FtxError {
  return error instanceof FtxError;
}
