/**
 * Gateway Configuration
 *
 * Everything a connection needs that is decided once, ahead of any call: which secure
 * transport backend to use, which certificates to trust, the close-frame policy and
 * whether receive metadata is captured.
 */

import { FileSystem } from '@effect/platform';
import type { PlatformError } from '@effect/platform/Error';
import { Config, Data, Duration, Effect, Layer, Option, pipe } from 'effect';

export type TlsBackend = 'node-tls' | 'plaintext';

/**
 * `terminal`: a peer Close fails the receive with `ConnectionClosedError`.
 * `no-message`: a peer Close is reported as "no message"; later operations still fail.
 */
export type ClosePolicy = 'terminal' | 'no-message';

export type TrustAnchors = Data.TaggedEnum<{
  /** Node's bundled root store */
  Bundled: {};
  Custom: { readonly ca: readonly string[] };
}>;

export const TrustAnchors = Data.taggedEnum<TrustAnchors>();

export type GatewayConfigService = {
  readonly tlsBackend: TlsBackend;
  readonly trustAnchors: TrustAnchors;
  readonly captureReceipts: boolean;
  readonly closePolicy: ClosePolicy;
  readonly connectTimeout: Duration.Duration;
  readonly fallbackValidationName: string;
  readonly maxPayload: number;
  /** Extra HTTP headers sent with the upgrade request. */
  readonly headers: Readonly<Record<string, string>>;
};

export class GatewayConfig extends Effect.Tag('GatewayConfig')<
  GatewayConfig,
  GatewayConfigService
>() {}

export const DEFAULT_FALLBACK_VALIDATION_NAME = 'gateway.invalid';

export const defaultGatewayConfig: GatewayConfigService = {
  tlsBackend: 'node-tls',
  trustAnchors: TrustAnchors.Bundled(),
  captureReceipts: false,
  closePolicy: 'terminal',
  connectTimeout: Duration.seconds(10),
  fallbackValidationName: DEFAULT_FALLBACK_VALIDATION_NAME,
  maxPayload: 100 * 1024 * 1024,
  headers: {},
};

export const makeGatewayConfigLayer = (overrides: Partial<GatewayConfigService> = {}) =>
  Layer.succeed(GatewayConfig, { ...defaultGatewayConfig, ...overrides });

const loadTrustAnchors = (
  caFile: Option.Option<string>
): Effect.Effect<TrustAnchors, PlatformError, FileSystem.FileSystem> =>
  Option.match(caFile, {
    onNone: () => Effect.succeed(TrustAnchors.Bundled()),
    onSome: (path) =>
      pipe(
        FileSystem.FileSystem,
        Effect.flatMap((fs) => fs.readFileString(path)),
        Effect.map((pem) => TrustAnchors.Custom({ ca: [pem] }))
      ),
  });

/**
 * Reads the configuration from the current `ConfigProvider` under `prefix`
 * (for the environment provider: `${prefix}_TLS_BACKEND`, `${prefix}_CA_FILE`, ...).
 */
export const makeGatewayConfigLive = (prefix: string) =>
  Layer.effect(
    GatewayConfig,
    pipe(
      Config.nested(
        Config.all({
          tlsBackend: Config.withDefault(
            Config.literal('node-tls', 'plaintext')('TLS_BACKEND'),
            defaultGatewayConfig.tlsBackend
          ),
          caFile: Config.option(Config.string('CA_FILE')),
          captureReceipts: Config.withDefault(
            Config.boolean('CAPTURE_RECEIPTS'),
            defaultGatewayConfig.captureReceipts
          ),
          closePolicy: Config.withDefault(
            Config.literal('terminal', 'no-message')('CLOSE_POLICY'),
            defaultGatewayConfig.closePolicy
          ),
          connectTimeout: Config.withDefault(
            Config.duration('CONNECT_TIMEOUT'),
            defaultGatewayConfig.connectTimeout
          ),
          fallbackValidationName: Config.withDefault(
            Config.string('FALLBACK_VALIDATION_NAME'),
            defaultGatewayConfig.fallbackValidationName
          ),
          maxPayload: Config.withDefault(
            Config.integer('MAX_PAYLOAD'),
            defaultGatewayConfig.maxPayload
          ),
        }),
        prefix
      ),
      Effect.flatMap(({ caFile, ...settings }) =>
        pipe(
          loadTrustAnchors(caFile),
          Effect.map(
            (trustAnchors): GatewayConfigService => ({
              ...defaultGatewayConfig,
              ...settings,
              trustAnchors,
            })
          )
        )
      )
    )
  );

export const GatewayConfigLive = makeGatewayConfigLive('GATEWAY');
