/**
 * Inbound webhook body could not be read as a webhook payload.
 * Acknowledged to the sender; never surfaced as a failure.
 */
export class ParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ParseError';
  }
}

/**
 * Verification handshake with a wrong mode or token.
 */
export class VerificationMismatchError extends Error {
  constructor(readonly mode: string | undefined) {
    super(`Webhook verification failed (mode: ${mode ?? 'missing'})`);
    this.name = 'VerificationMismatchError';
  }
}
