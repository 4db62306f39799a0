export type DispatchErrorKind = 'transport' | 'window_expired' | 'api';

/** Graph API error code/subcode for a message sent outside the allowed window. */
export const WINDOW_EXPIRED_CODE = 10;
export const WINDOW_EXPIRED_SUBCODE = 2018278;

/**
 * Failure of a single outbound message call.
 */
export abstract class DispatchError extends Error {
  abstract readonly kind: DispatchErrorKind;

  /** Retrying cannot succeed */
  abstract readonly terminal: boolean;
}

/**
 * No HTTP response: timeout, refused connection, DNS failure.
 */
export class TransportError extends DispatchError {
  readonly kind = 'transport';
  readonly terminal = false;

  constructor(message: string, cause?: unknown) {
    super(`Transport error: ${message}`, { cause });
    this.name = 'TransportError';
  }
}

/**
 * The recipient's messaging window is closed; the platform refuses the DM.
 */
export class WindowExpiredError extends DispatchError {
  readonly kind = 'window_expired';
  readonly terminal = true;

  constructor(
    readonly status: number,
    platformMessage?: string,
  ) {
    super(
      `Messaging window expired (status ${status})${platformMessage ? `: ${platformMessage}` : ''}`,
    );
    this.name = 'WindowExpiredError';
  }
}

/**
 * Any other non-2xx response from the messaging endpoint.
 */
export class GenericApiError extends DispatchError {
  readonly kind = 'api';
  readonly terminal = false;

  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`API error (status ${status}): ${body}`);
    this.name = 'GenericApiError';
  }
}
