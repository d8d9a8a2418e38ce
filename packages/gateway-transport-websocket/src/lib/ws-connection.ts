/**
 * WebSocket Connection
 *
 * Runs the upgrade over an already-open stream and adapts the resulting `ws` socket to the
 * frame-level `Connection`. Listeners are attached before the upgrade completes so frames
 * sent together with the upgrade response are never missed.
 */

import type * as net from 'node:net';
import { Effect, Option, Predicate, Runtime, pipe } from 'effect';
import WebSocket from 'ws';
import {
  type Connection,
  type FrameSink,
  type GatewayConfigService,
  type InboundPort,
  type TransportError,
  type TransportIoError,
  WireFrame,
  makeFrameChannel,
} from '@gatewire/gateway-transport';
import {
  classifyClose,
  classifyHandshakeFailure,
  classifyStreamFailure,
  unexpectedResponse,
} from './classify';

const toBytes = (data: WebSocket.RawData): Uint8Array =>
  Array.isArray(data) ? new Uint8Array(Buffer.concat(data)) : new Uint8Array(data);

const textDecoder = new TextDecoder();

const writeFailure = classifyStreamFailure('write');

const writeTo =
  (ws: WebSocket) =>
  (frame: WireFrame): Effect.Effect<void, TransportIoError> =>
    Effect.async<void, TransportIoError>((resume) => {
      const done = (error?: Error) => resume(error ? Effect.fail(writeFailure(error)) : Effect.void);

      WireFrame.$match({
        Text: ({ text }) => ws.send(text, done),
        Binary: ({ bytes }) => ws.send(bytes, { binary: true }, done),
        Ping: ({ bytes }) => ws.ping(bytes, undefined, done),
        Pong: ({ bytes }) => ws.pong(bytes, undefined, done),
        Close: ({ code, reason }) => {
          ws.close(Option.getOrUndefined(code), reason);
          done();
        },
      })(frame);
    });

const closeSocket = (ws: WebSocket) => (code: number, reason: string) =>
  Effect.sync(() =>
    ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING
      ? ws.close(code, reason)
      : undefined
  );

const sinkFor = (ws: WebSocket): FrameSink => ({
  write: writeTo(ws),
  close: closeSocket(ws),
});

const attachInbound = (ws: WebSocket, inbound: InboundPort, run: <A>(effect: Effect.Effect<A>) => A) => {
  ws.on('message', (data, isBinary) =>
    run(
      inbound.frame(
        isBinary
          ? WireFrame.Binary({ bytes: toBytes(data) })
          : WireFrame.Text({ text: textDecoder.decode(toBytes(data)) })
      )
    )
  );
  ws.on('ping', (data) => run(inbound.frame(WireFrame.Ping({ bytes: new Uint8Array(data) }))));
  ws.on('pong', (data) => run(inbound.frame(WireFrame.Pong({ bytes: new Uint8Array(data) }))));
  ws.on('close', (code, reason) => {
    const outcome = classifyClose(code, reason.toString('utf8'));
    run(
      Predicate.isTagged(outcome, 'TransportIoError')
        ? inbound.fail(outcome)
        : inbound.frame(outcome)
    );
  });
  ws.on('error', (error) => run(inbound.fail(classifyStreamFailure('read')(error))));
};

/**
 * Performs the upgrade on `socket` and yields a connected `Connection`. On failure or
 * interruption the socket is torn down.
 */
export const upgradeConnection = (
  url: URL,
  socket: net.Socket,
  config: GatewayConfigService
): Effect.Effect<Connection, TransportError> =>
  pipe(
    Effect.runtime<never>(),
    Effect.flatMap((runtime) =>
      Effect.async<Connection, TransportError>((resume) => {
        const run = Runtime.runSync(runtime);
        const ws = new WebSocket(url, {
          createConnection: () => socket,
          autoPong: false,
          perMessageDeflate: false,
          maxPayload: config.maxPayload,
          headers: { ...config.headers },
        });
        const { connection, inbound } = run(makeFrameChannel(sinkFor(ws)));

        attachInbound(ws, inbound, run);

        ws.once('open', () => resume(Effect.succeed(connection)));
        ws.once('unexpected-response', (_request, response) => {
          response.resume();
          resume(Effect.fail(unexpectedResponse(response.statusCode, response.statusMessage)));
          ws.terminate();
        });
        // Only the first outcome resumes; later errors reach the channel through attachInbound.
        ws.on('error', (error) => resume(Effect.fail(classifyHandshakeFailure(error))));

        return Effect.sync(() => ws.terminate());
      })
    )
  );
