/**
 * Gateway Transport Error Taxonomy
 *
 * A closed set of tagged errors. Callers branch on `_tag` (or `Effect.catchTag`),
 * never on message text.
 */

import { Data, Option, Predicate } from 'effect';

// ============================================================================
// Connect-time Errors
// ============================================================================

/**
 * The peer certificate chain or its identity failed validation before the upgrade.
 */
export class CertificateValidationError extends Data.TaggedError('CertificateValidationError')<{
  readonly message: string;
  readonly validationName: string;
  readonly code?: string;
  readonly cause?: unknown;
}> {}

/**
 * The WebSocket upgrade was rejected or could not be completed.
 */
export class HandshakeFailureError extends Data.TaggedError('HandshakeFailureError')<{
  readonly message: string;
  readonly status?: number;
  readonly cause?: unknown;
}> {}

export type IoOperation = 'connect' | 'read' | 'write' | 'close';

export class TransportIoError extends Data.TaggedError('TransportIoError')<{
  readonly message: string;
  readonly operation: IoOperation;
  readonly cause?: unknown;
}> {}

// ============================================================================
// Payload Errors
// ============================================================================

/**
 * A frame payload could not be turned into a structured value.
 * `raw` holds the payload exactly as it arrived (still compressed for binary frames).
 */
export class MalformedPayloadError extends Data.TaggedError('MalformedPayloadError')<{
  readonly message: string;
  readonly kind: 'text' | 'binary';
  readonly raw: string | Uint8Array;
  readonly cause?: unknown;
}> {}

export class EncodeError extends Data.TaggedError('EncodeError')<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// ============================================================================
// Closure
// ============================================================================

export class ConnectionClosedError extends Data.TaggedError('ConnectionClosedError')<{
  readonly message: string;
  readonly code: Option.Option<number>;
  readonly reason: string;
}> {
  static fromCloseFrame = (code: Option.Option<number>, reason: string) =>
    new ConnectionClosedError({
      message: Option.match(code, {
        onNone: () => 'Connection closed by peer',
        onSome: (value) => `Connection closed by peer (${value}${reason ? `: ${reason}` : ''})`,
      }),
      code,
      reason,
    });
}

// ============================================================================
// Unions and Guards
// ============================================================================

export type TransportError = CertificateValidationError | HandshakeFailureError | TransportIoError;

/**
 * Errors after which the connection is dead.
 */
export type TerminalError = TransportIoError | ConnectionClosedError;

export type SendError = EncodeError | TerminalError;

export const isTransportError = (error: unknown): error is TransportError =>
  Predicate.isTagged(error, 'CertificateValidationError') ||
  Predicate.isTagged(error, 'HandshakeFailureError') ||
  Predicate.isTagged(error, 'TransportIoError');

export const isTerminalError = (error: unknown): error is TerminalError =>
  Predicate.isTagged(error, 'TransportIoError') || Predicate.isTagged(error, 'ConnectionClosedError');

export const ioError =
  (operation: IoOperation) =>
  (message: string, cause?: unknown): TransportIoError =>
    new TransportIoError({
      message,
      operation,
      ...(cause !== undefined && { cause }),
    });
