/**
 * Error Classifier
 *
 * Maps what Node, `node:tls` and `ws` throw or emit onto the gateway error taxonomy.
 */

import { Option, Predicate, pipe } from 'effect';
import {
  CertificateValidationError,
  HandshakeFailureError,
  WireFrame,
  ioError,
  type IoOperation,
  type TransportError,
  type TransportIoError,
} from '@gatewire/gateway-transport';

// OpenSSL verify results and Node's identity check, as reported on `error.code`.
const CERTIFICATE_ERROR_CODES: ReadonlySet<string> = new Set([
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_DECRYPT_CERT_SIGNATURE',
  'UNABLE_TO_DECODE_ISSUER_PUBLIC_KEY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'CERT_SIGNATURE_FAILURE',
  'CERT_NOT_YET_VALID',
  'CERT_HAS_EXPIRED',
  'CERT_CHAIN_TOO_LONG',
  'CERT_REVOKED',
  'CERT_UNTRUSTED',
  'CERT_REJECTED',
  'ERROR_IN_CERT_NOT_BEFORE_FIELD',
  'ERROR_IN_CERT_NOT_AFTER_FIELD',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'INVALID_CA',
  'INVALID_PURPOSE',
  'PATH_LENGTH_EXCEEDED',
  'HOSTNAME_MISMATCH',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

/** Close code reported when the link ended without a Close frame. */
export const ABNORMAL_CLOSURE = 1006;
/** Close code reported when a Close frame carried no status. */
export const NO_STATUS_RECEIVED = 1005;

export const errorCode = (error: unknown): Option.Option<string> =>
  Predicate.hasProperty(error, 'code') && Predicate.isString(error.code)
    ? Option.some(error.code)
    : Option.none();

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isCertificateErrorCode = (code: string): boolean => CERTIFICATE_ERROR_CODES.has(code);

/**
 * Failures while opening the secure stream: certificate problems, or plain I/O.
 */
export const classifyTlsFailure =
  (validationName: string) =>
  (error: unknown): CertificateValidationError | TransportIoError =>
    pipe(
      errorCode(error),
      Option.filter(isCertificateErrorCode),
      Option.match({
        onSome: (code) =>
          new CertificateValidationError({
            message: `Certificate for ${validationName} failed validation: ${errorMessage(error)}`,
            validationName,
            code,
            cause: error,
          }),
        onNone: () => ioError('connect')(errorMessage(error), error),
      })
    );

/**
 * Failures during the upgrade. OS and stream errors carry a code; the upgrade's own
 * protocol errors (bad status line, bad accept key) do not, or carry a `WS_ERR_` code.
 */
export const classifyHandshakeFailure = (error: unknown): TransportError =>
  pipe(
    errorCode(error),
    Option.filter((code) => !code.startsWith('WS_ERR_')),
    Option.match({
      onSome: () => ioError('connect')(errorMessage(error), error),
      onNone: () =>
        new HandshakeFailureError({
          message: `WebSocket upgrade failed: ${errorMessage(error)}`,
          cause: error,
        }),
    })
  );

export const unexpectedResponse = (status: number | undefined, statusText: string | undefined) =>
  new HandshakeFailureError({
    message: `WebSocket upgrade rejected with HTTP ${status ?? 'unknown status'}${
      statusText ? ` ${statusText}` : ''
    }`,
    ...(status !== undefined && { status }),
  });

export const classifyStreamFailure =
  (operation: IoOperation) =>
  (error: unknown): TransportIoError =>
    ioError(operation)(errorMessage(error), error);

/**
 * A peer Close becomes a Close frame; an abnormal closure (no Close frame at all) is an
 * I/O failure.
 */
export const classifyClose = (code: number, reason: string): WireFrame | TransportIoError =>
  code === ABNORMAL_CLOSURE
    ? ioError('read')(`Connection dropped without a close frame (${ABNORMAL_CLOSURE})`)
    : WireFrame.Close({
        code: code === NO_STATUS_RECEIVED ? Option.none() : Option.some(code),
        reason,
      });
