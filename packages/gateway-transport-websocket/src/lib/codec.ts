/**
 * Frame Codec
 *
 * Turns inbound wire frames into structured values and structured values into outbound
 * Text frames. Binary payloads are zlib streams and are inflated before parsing; outbound
 * values are never compressed.
 */

import { inflateSync } from 'node:zlib';
import { Effect, Either, Option, Schema, pipe } from 'effect';
import {
  type CloseFrame,
  type Connection,
  ConnectionClosedError,
  DiagnosticSink,
  EncodeError,
  GatewayConfig,
  type GatewayConnection,
  MalformedPayloadError,
  type ReceiveMode,
  type ReceivedMessage,
  type SendError,
  type StructuredValue,
  type TerminalError,
  WireFrame,
  defaultGatewayConfig,
  describeFrame,
  makeDecodedEvent,
} from '@gatewire/gateway-transport';
import { errorMessage } from './classify';
import { makeControlFrameHandler } from './control-frames';

// ============================================================================
// Payload Decoding
// ============================================================================

const Json = Schema.parseJson();

const parseJson = Schema.decodeUnknownEither(Json);
const stringifyJson = Schema.encodeEither(Json);

const utf8 = new TextDecoder('utf-8', { fatal: true });

type Decoded = Either.Either<StructuredValue, MalformedPayloadError>;

export const decodeText = (text: string): Decoded =>
  pipe(
    parseJson(text),
    Either.mapLeft(
      (error) =>
        new MalformedPayloadError({
          message: `Text payload is not valid JSON: ${error.message}`,
          kind: 'text',
          raw: text,
          cause: error,
        })
    )
  );

/**
 * Inflate, then UTF-8, then JSON. The error keeps the payload as it arrived, still
 * compressed. Inflating past `maxOutputLength` bytes is a decode failure.
 */
export const decodeBinary = (
  bytes: Uint8Array,
  maxOutputLength: number = defaultGatewayConfig.maxPayload
): Decoded => {
  const malformed = (message: string, cause: unknown) =>
    new MalformedPayloadError({ message, kind: 'binary', raw: bytes, cause });

  return pipe(
    Either.try({
      try: () => inflateSync(bytes, { maxOutputLength }),
      catch: (cause) => malformed(`Binary payload could not be inflated: ${errorMessage(cause)}`, cause),
    }),
    Either.flatMap((inflated) =>
      Either.try({
        try: () => utf8.decode(inflated),
        catch: (cause) => malformed('Inflated payload is not valid UTF-8', cause),
      })
    ),
    Either.flatMap((text) =>
      pipe(
        parseJson(text),
        Either.mapLeft((error) =>
          malformed(`Inflated payload is not valid JSON: ${error.message}`, error)
        )
      )
    )
  );
};

export const encodeValue = (value: StructuredValue): Either.Either<string, EncodeError> =>
  pipe(
    stringifyJson(value),
    Either.mapLeft(
      (error) =>
        new EncodeError({
          message: `Value could not be serialized: ${error.message}`,
          cause: error,
        })
    )
  );

// ============================================================================
// Gateway Connection
// ============================================================================

/**
 * Wraps a frame-level `Connection` with the codec, the close policy and the control-frame
 * handler.
 */
export const makeGatewayConnection = (
  connection: Connection
): Effect.Effect<GatewayConnection, never, GatewayConfig | DiagnosticSink> =>
  pipe(
    Effect.all({
      config: GatewayConfig,
      diagnostics: DiagnosticSink,
      control: makeControlFrameHandler(connection),
    }),
    Effect.map(({ config, diagnostics, control }): GatewayConnection => {
      const deliver = (
        frame: WireFrame,
        result: Decoded
      ): Effect.Effect<Option.Option<ReceivedMessage>> =>
        pipe(
          Either.isLeft(result) ? diagnostics.malformedPayload(result.left) : Effect.void,
          Effect.zipRight(makeDecodedEvent(frame, config.captureReceipts)),
          Effect.map((event) => Option.some({ event, result }))
        );

      const nextFrame = (mode: ReceiveMode): Effect.Effect<Option.Option<WireFrame>, TerminalError> =>
        mode === 'blocking' ? Effect.map(connection.readFrame, Option.some) : connection.pollFrame;

      const closeOutcome = (
        frame: CloseFrame
      ): Effect.Effect<Option.Option<ReceivedMessage>, ConnectionClosedError> =>
        config.closePolicy === 'terminal'
          ? Effect.fail(ConnectionClosedError.fromCloseFrame(frame.code, frame.reason))
          : Effect.succeed(Option.none());

      const peerClosed = (frame: CloseFrame) =>
        pipe(
          Effect.logDebug(`Peer closed the connection: ${describeFrame(frame)}`),
          Effect.zipRight(closeOutcome(frame))
        );

      const receiveDecoded = (
        mode: ReceiveMode
      ): Effect.Effect<Option.Option<ReceivedMessage>, TerminalError> =>
        pipe(
          nextFrame(mode),
          Effect.flatMap(
            Option.match({
              onNone: () => Effect.succeed(Option.none<ReceivedMessage>()),
              onSome: handleFrame(mode),
            })
          )
        );

      const keepReading = (mode: ReceiveMode) => Effect.suspend(() => receiveDecoded(mode));

      const handleFrame =
        (mode: ReceiveMode) =>
        (frame: WireFrame): Effect.Effect<Option.Option<ReceivedMessage>, TerminalError> =>
          WireFrame.$match(frame, {
            Text: ({ text }) => deliver(frame, decodeText(text)),
            Binary: ({ bytes }) => deliver(frame, decodeBinary(bytes, config.maxPayload)),
            Ping: ({ bytes }) =>
              pipe(
                control.onPing(bytes),
                Effect.catchTag('ConnectionClosedError', () =>
                  Effect.logDebug('Ping left unanswered: connection already closed')
                ),
                Effect.zipRight(keepReading(mode))
              ),
            Pong: ({ bytes }) => pipe(control.onPong(bytes), Effect.zipRight(keepReading(mode))),
            Close: peerClosed,
          });

      const sendEncoded = (value: StructuredValue): Effect.Effect<void, SendError> =>
        Either.match(encodeValue(value), {
          onLeft: (error) => Effect.fail(error),
          onRight: (text) => connection.writeFrame(WireFrame.Text({ text })),
        });

      return {
        connection,
        receiveDecoded,
        sendEncoded,
        controlStats: control.stats,
        close: connection.close,
      };
    })
  );
