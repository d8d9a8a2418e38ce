/**
 * Connection Establishment Tests
 *
 * Address parsing on its own, then real connections against a loopback gateway: plaintext
 * and TLS upgrades, control frames on the wire, and every connect-time failure class.
 */

import { deflateSync } from 'node:zlib';
import { describe, it, expect } from '@effect/vitest';
import { ConfigProvider, Duration, Effect, Either, Option, Queue, pipe } from 'effect';
import {
  type GatewayConfigService,
  GatewayConnector,
  TrustAnchors,
} from '@gatewire/gateway-transport';
import {
  gatewayCertificate,
  makeTestGateway,
  mismatchedCertificate,
  nextPeer,
  sendFromServer,
} from '../tests/test-server';
import { GatewayTransportLive, makeGatewayTransportLayer, parseAddress } from './establish';

// =============================================================================
// Test Helpers
// =============================================================================

const connectWith = (address: string, overrides: Partial<GatewayConfigService> = {}) =>
  pipe(
    GatewayConnector,
    Effect.flatMap((connector) => connector.connect(address)),
    Effect.provide(makeGatewayTransportLayer(overrides))
  );

const plaintext = { tlsBackend: 'plaintext' } as const;

const trusting = (cert: string) => ({ trustAnchors: TrustAnchors.Custom({ ca: [cert] }) });

const hello = { op: 10, d: { heartbeat_interval: 41250 } };

// =============================================================================
// Address Parsing
// =============================================================================

describe('parseAddress', () => {
  it('should default the port from the scheme and derive the validation name', () => {
    const { url, target } = Either.getOrThrow(
      parseAddress('wss://gateway.example.com/?v=10&encoding=json', 'gateway.invalid')
    );

    expect(url.search).toBe('?v=10&encoding=json');
    expect(target).toEqual({
      host: 'gateway.example.com',
      port: 443,
      validationName: 'example.com',
    });
  });

  it('should keep an explicit port', () => {
    expect(Either.getOrThrow(parseAddress('ws://127.0.0.1:9000', 'gateway.invalid')).target).toEqual(
      { host: '127.0.0.1', port: 9000, validationName: '127.0.0.1' }
    );
  });

  it('should strip the brackets of an IPv6 host', () => {
    expect(Either.getOrThrow(parseAddress('wss://[::1]:8443/', 'gateway.invalid')).target.host).toBe(
      '::1'
    );
  });

  it('should reject schemes other than ws and wss', () => {
    const error = Either.getOrThrow(Either.flip(parseAddress('https://example.test/', 'gateway.invalid')));

    expect(error.operation).toBe('connect');
    expect(error.message).toBe('Unsupported gateway scheme https: in https://example.test/');
  });

  it('should reject text that is not a URL', () => {
    expect(
      Either.getOrThrow(Either.flip(parseAddress('not a url', 'gateway.invalid'))).message
    ).toBe('Invalid gateway address: not a url');
  });
});

// =============================================================================
// Plaintext Gateway
// =============================================================================

describe('connect over plaintext', () => {
  it.scopedLive('should decode inbound frames and send encoded values', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway();
      const gateway = yield* connectWith(server.url, plaintext);
      const peer = yield* nextPeer(server);

      yield* sendFromServer(peer, new Uint8Array(deflateSync(JSON.stringify(hello))), true);
      const message = yield* gateway.receiveDecoded('blocking');
      expect(Option.map(message, ({ result }) => result)).toEqual(Option.some(Either.right(hello)));

      yield* gateway.sendEncoded({ op: 2, d: { token: 'test-secret' } });
      const sent = yield* Queue.take(peer.messages);
      expect(sent.isBinary).toBe(false);
      expect(sent.data.toString('utf8')).toBe('{"op":2,"d":{"token":"test-secret"}}');
    })
  );

  it.scopedLive('should answer a server ping with the same payload', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway();
      const gateway = yield* connectWith(server.url, plaintext);
      const peer = yield* nextPeer(server);

      peer.socket.ping(Buffer.from('hb'));
      yield* sendFromServer(peer, '{"op":11}', false);

      const message = yield* gateway.receiveDecoded('blocking');
      const pong = yield* Queue.take(peer.pongs);
      const stats = yield* gateway.controlStats;

      expect(Option.map(message, ({ result }) => result)).toEqual(
        Option.some(Either.right({ op: 11 }))
      );
      expect(pong.toString('utf8')).toBe('hb');
      expect(stats.pingsAnswered).toBe(1);
    })
  );

  it.scopedLive('should fail the receive with the peer close code', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway();
      const gateway = yield* connectWith(server.url, plaintext);
      const peer = yield* nextPeer(server);

      peer.socket.close(4000, 'bye');
      const error = yield* Effect.flip(gateway.receiveDecoded('blocking'));

      expect(error._tag).toBe('ConnectionClosedError');
      expect(error.message).toBe('Connection closed by peer (4000: bye)');
    })
  );

  it.scopedLive('should close with a normal closure code', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway();
      const gateway = yield* connectWith(server.url, plaintext);
      const peer = yield* nextPeer(server);

      yield* gateway.close();
      const closed = yield* Queue.take(peer.closes);

      expect(closed.code).toBe(1000);
      expect(yield* gateway.connection.isOpen).toBe(false);
    })
  );

  it.scopedLive('should send the configured headers with the upgrade request', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway();
      yield* connectWith(server.url, { ...plaintext, headers: { 'X-Client-Build': 'test-build' } });
      const peer = yield* nextPeer(server);

      expect(peer.headers['x-client-build']).toBe('test-build');
    })
  );

  it.scopedLive('should read its settings from the environment', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway();
      const gateway = yield* pipe(
        GatewayConnector,
        Effect.flatMap((connector) => connector.connect(server.url)),
        Effect.provide(GatewayTransportLive),
        Effect.withConfigProvider(
          ConfigProvider.fromMap(new Map([['GATEWAY_TLS_BACKEND', 'plaintext']]), {
            pathDelim: '_',
          })
        )
      );
      const peer = yield* nextPeer(server);

      yield* sendFromServer(peer, '{"op":0}', false);
      const message = yield* gateway.receiveDecoded('blocking');

      expect(Option.map(message, ({ result }) => result)).toEqual(
        Option.some(Either.right({ op: 0 }))
      );
    })
  );
});

// =============================================================================
// TLS Gateway
// =============================================================================

describe('connect over TLS', () => {
  it.scopedLive('should connect when the certificate chains to a trusted anchor', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway({ tls: gatewayCertificate });
      const gateway = yield* connectWith(server.url, trusting(gatewayCertificate.cert));
      const peer = yield* nextPeer(server);

      yield* sendFromServer(peer, '{"op":11}', false);
      const message = yield* gateway.receiveDecoded('blocking');

      expect(Option.map(message, ({ result }) => result)).toEqual(
        Option.some(Either.right({ op: 11 }))
      );
    })
  );

  it.scopedLive('should reject a certificate outside the trust anchors', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway({ tls: gatewayCertificate });
      const error = yield* Effect.flip(connectWith(server.url));

      expect(error._tag).toBe('CertificateValidationError');
      expect(error._tag === 'CertificateValidationError' && error.validationName).toBe(
        '127.0.0.1'
      );
      expect(error._tag === 'CertificateValidationError' && error.code).toBe(
        'DEPTH_ZERO_SELF_SIGNED_CERT'
      );
    })
  );

  it.scopedLive('should reject a trusted certificate issued for another name', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway({ tls: mismatchedCertificate });
      const error = yield* Effect.flip(
        connectWith(server.url, trusting(mismatchedCertificate.cert))
      );

      expect(error._tag).toBe('CertificateValidationError');
      expect(error._tag === 'CertificateValidationError' && error.code).toBe(
        'ERR_TLS_CERT_ALTNAME_INVALID'
      );
    })
  );
});

// =============================================================================
// Connect-time Failures
// =============================================================================

describe('connect failures', () => {
  it.scopedLive('should report a rejected upgrade as a handshake failure', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway({ rejectWith: 401 });
      const error = yield* Effect.flip(connectWith(server.url, plaintext));

      expect(error._tag).toBe('HandshakeFailureError');
      expect(error.message).toBe('WebSocket upgrade rejected with HTTP 401 Unauthorized');
      expect(error._tag === 'HandshakeFailureError' && error.status).toBe(401);
    })
  );

  it.scopedLive('should report a refused connection as an I/O failure', () =>
    Effect.gen(function* () {
      const port = yield* Effect.scoped(Effect.map(makeTestGateway(), (server) => server.port));
      const error = yield* Effect.flip(connectWith(`ws://127.0.0.1:${port}/`, plaintext));

      expect(error._tag).toBe('TransportIoError');
      expect(error._tag === 'TransportIoError' && error.operation).toBe('connect');
    })
  );

  it.scopedLive('should give up when the upgrade never completes', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway({ stall: true });
      const [elapsed, error] = yield* Effect.timed(
        Effect.flip(connectWith(server.url, { ...plaintext, connectTimeout: Duration.millis(200) }))
      );

      expect(error._tag).toBe('TransportIoError');
      expect(error.message).toMatch(/^Timed out after .* connecting to ws:\/\/127\.0\.0\.1:/);
      expect(Duration.toMillis(elapsed)).toBeLessThan(1_500);
    })
  );

  it.scopedLive('should drop the socket of an upgrade that completes after the timeout', () =>
    Effect.gen(function* () {
      const server = yield* makeTestGateway({ upgradeDelayMillis: 600 });
      const error = yield* Effect.flip(
        connectWith(server.url, { ...plaintext, connectTimeout: Duration.millis(200) })
      );

      expect(error.message).toMatch(/^Timed out after /);

      yield* Queue.take(server.disconnects);
    })
  );

  it.scopedLive('should refuse an unsupported scheme before opening a socket', () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(connectWith('http://127.0.0.1:1/', plaintext));

      expect(error._tag).toBe('TransportIoError');
      expect(error.message).toBe('Unsupported gateway scheme http: in http://127.0.0.1:1/');
    })
  );
});
