/**
 * Secure Transport
 *
 * Opens the raw byte stream the WebSocket upgrade runs over. The backend is a service so it
 * is chosen once, when layers are built, and never per call:
 *
 * - `node-tls`: `node:tls`, chain checked against the configured trust anchors and the
 *   certificate identity checked against the derived validation name;
 * - `plaintext`: `node:net`, for `ws://` loopback endpoints.
 */

import * as net from 'node:net';
import * as tls from 'node:tls';
import { Context, Effect, Layer, pipe } from 'effect';
import {
  GatewayConfig,
  TrustAnchors,
  type TlsBackend,
  type TransportError,
} from '@gatewire/gateway-transport';
import { classifyStreamFailure, classifyTlsFailure } from './classify';
import type { ValidationName } from './validation-name';

export interface TransportTarget {
  readonly host: string;
  readonly port: number;
  readonly validationName: ValidationName;
}

export class SecureTransport extends Context.Tag('@gateway/SecureTransport')<
  SecureTransport,
  {
    readonly backend: TlsBackend;
    readonly open: (target: TransportTarget) => Effect.Effect<net.Socket, TransportError>;
  }
>() {}

// =============================================================================
// node:tls
// =============================================================================

// `undefined` leaves Node on its bundled root store.
const certificateAuthorities: (anchors: TrustAnchors) => string[] | undefined =
  TrustAnchors.$match({
    Bundled: () => undefined,
    Custom: ({ ca }) => [...ca],
  });

const openTls =
  (ca: string[] | undefined) =>
  (target: TransportTarget): Effect.Effect<net.Socket, TransportError> =>
    Effect.async<net.Socket, TransportError>((resume) => {
      const socket = tls.connect({
        host: target.host,
        port: target.port,
        // SNI carries the real host; IP literals are not allowed as a server name.
        ...(net.isIP(target.host) === 0 && { servername: target.host }),
        ca,
        ALPNProtocols: ['http/1.1'],
        checkServerIdentity: (_hostname, certificate) =>
          tls.checkServerIdentity(target.validationName, certificate),
      });

      socket.once('error', (error) => resume(Effect.fail(classifyTlsFailure(target.validationName)(error))));
      socket.once('secureConnect', () => resume(Effect.succeed(socket)));

      return Effect.sync(() => socket.destroy());
    });

export const makeNodeTlsTransport = (
  anchors: TrustAnchors
): Context.Tag.Service<typeof SecureTransport> => ({
  backend: 'node-tls',
  open: openTls(certificateAuthorities(anchors)),
});

// =============================================================================
// node:net
// =============================================================================

const openPlain = (target: TransportTarget): Effect.Effect<net.Socket, TransportError> =>
  Effect.async<net.Socket, TransportError>((resume) => {
    const socket = net.connect({ host: target.host, port: target.port });

    socket.once('error', (error) => resume(Effect.fail(classifyStreamFailure('connect')(error))));
    socket.once('connect', () => resume(Effect.succeed(socket)));

    return Effect.sync(() => socket.destroy());
  });

export const plaintextTransport: Context.Tag.Service<typeof SecureTransport> = {
  backend: 'plaintext',
  open: openPlain,
};

// =============================================================================
// Layers
// =============================================================================

export const NodeTlsTransportLive = Layer.effect(
  SecureTransport,
  Effect.map(GatewayConfig, (config) => makeNodeTlsTransport(config.trustAnchors))
);

export const PlaintextTransportLive = Layer.succeed(SecureTransport, plaintextTransport);

/**
 * Picks the backend named by `GatewayConfig.tlsBackend`.
 */
export const SecureTransportLive = pipe(
  GatewayConfig,
  Effect.map(
    (config): Layer.Layer<SecureTransport, never, GatewayConfig> =>
      config.tlsBackend === 'plaintext' ? PlaintextTransportLive : NodeTlsTransportLive
  ),
  Layer.unwrapEffect
);
