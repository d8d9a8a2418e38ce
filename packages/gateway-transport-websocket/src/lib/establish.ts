/**
 * Connection Establishment
 *
 * `connect` runs the whole sequence: parse the address, derive the certificate validation
 * name, open the secure stream, run the WebSocket upgrade and wrap the result with the frame
 * codec. Any failure aborts the call and nothing half-open escapes. The returned connection
 * is closed when the surrounding scope closes.
 */

import { NodeFileSystem } from '@effect/platform-node';
import { Duration, Effect, Either, Layer, type Scope, pipe } from 'effect';
import {
  DiagnosticSink,
  DiagnosticSinkLive,
  GatewayConfig,
  GatewayConfigLive,
  type GatewayConfigService,
  type GatewayConnection,
  GatewayConnector,
  type TransportError,
  type TransportIoError,
  ioError,
  makeGatewayConfigLayer,
} from '@gatewire/gateway-transport';
import { makeGatewayConnection } from './codec';
import { SecureTransport, SecureTransportLive, type TransportTarget } from './secure-transport';
import { deriveValidationName, stripBrackets } from './validation-name';
import { upgradeConnection } from './ws-connection';

export interface GatewayAddress {
  readonly url: URL;
  readonly target: TransportTarget;
}

const DEFAULT_PORTS: Readonly<Record<string, number>> = {
  'wss:': 443,
  'ws:': 80,
};

const connectFailure = ioError('connect');

/**
 * Accepts `wss://` and `ws://` URLs only. The port defaults from the scheme.
 */
export const parseAddress = (
  address: string,
  fallbackValidationName: string
): Either.Either<GatewayAddress, TransportIoError> =>
  pipe(
    Either.try({
      try: () => new URL(address),
      catch: (cause) => connectFailure(`Invalid gateway address: ${address}`, cause),
    }),
    Either.filterOrLeft(
      (url) => url.protocol in DEFAULT_PORTS,
      (url) => connectFailure(`Unsupported gateway scheme ${url.protocol} in ${address}`)
    ),
    Either.map((url) => {
      const host = stripBrackets(url.hostname);
      return {
        url,
        target: {
          host,
          port: url.port === '' ? (DEFAULT_PORTS[url.protocol] ?? 443) : Number(url.port),
          validationName: deriveValidationName(host, fallbackValidationName),
        },
      };
    })
  );

const establish = (
  address: string,
  config: GatewayConfigService
): Effect.Effect<GatewayConnection, TransportError, Scope.Scope | DiagnosticSink | SecureTransport> =>
  pipe(
    parseAddress(address, config.fallbackValidationName),
    Effect.flatMap(({ url, target }) =>
      pipe(
        SecureTransport,
        Effect.flatMap((transport) => transport.open(target)),
        Effect.flatMap((socket) =>
          pipe(
            upgradeConnection(url, socket, config),
            Effect.onError(() => Effect.sync(() => socket.destroy()))
          )
        ),
        // acquire runs uninterruptibly; the timeout has to be able to tear down a stalled upgrade
        Effect.interruptible,
        Effect.timeoutFail({
          duration: config.connectTimeout,
          onTimeout: () =>
            connectFailure(
              `Timed out after ${Duration.format(config.connectTimeout)} connecting to ${address}`
            ),
        }),
        Effect.tap(() =>
          Effect.logDebug(`Upgrade complete (validation name ${target.validationName})`)
        )
      )
    ),
    (acquire) => Effect.acquireRelease(acquire, (connection) => connection.close()),
    Effect.flatMap(makeGatewayConnection),
    Effect.provideService(GatewayConfig, config)
  );

/**
 * Opens a gateway connection to a `wss://` (or `ws://`) address.
 */
export const connect = (
  address: string
): Effect.Effect<
  GatewayConnection,
  TransportError,
  Scope.Scope | GatewayConfig | DiagnosticSink | SecureTransport
> =>
  pipe(
    GatewayConfig,
    Effect.flatMap((config) => establish(address, config)),
    Effect.tap(() => Effect.logInfo('Gateway connection established')),
    Effect.tapError((error) => Effect.logError(`Gateway connection failed: ${error.message}`)),
    Effect.annotateLogs({ address })
  );

// =============================================================================
// Layers
// =============================================================================

export const GatewayConnectorLive = Layer.effect(
  GatewayConnector,
  pipe(
    Effect.context<GatewayConfig | DiagnosticSink | SecureTransport>(),
    Effect.map((context) => ({
      connect: (address: string) => Effect.provide(connect(address), context),
    }))
  )
);

/**
 * A connector with the given settings layered over the defaults. Does not read the
 * environment.
 */
export const makeGatewayTransportLayer = (overrides: Partial<GatewayConfigService> = {}) =>
  pipe(
    GatewayConnectorLive,
    Layer.provide(SecureTransportLive),
    Layer.provide(Layer.merge(makeGatewayConfigLayer(overrides), DiagnosticSinkLive))
  );

/**
 * A connector configured from the environment (`GATEWAY_*`).
 */
export const GatewayTransportLive = pipe(
  GatewayConnectorLive,
  Layer.provide(SecureTransportLive),
  Layer.provide(Layer.merge(GatewayConfigLive, DiagnosticSinkLive)),
  Layer.provide(NodeFileSystem.layer)
);
