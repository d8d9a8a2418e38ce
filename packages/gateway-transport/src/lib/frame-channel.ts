/**
 * Frame Channel
 *
 * The inbound queue and terminal-state bookkeeping shared by every `Connection`
 * implementation. A backend pushes frames and failures through the returned
 * `InboundPort`; the caller reads them through the `Connection`.
 */

import { Effect, Either, Option, Queue, Ref, pipe } from 'effect';
import type { Connection } from './connection';
import { ConnectionClosedError, ioError, type TerminalError, type TransportIoError } from './errors';
import type { WireFrame } from './frames';

export interface FrameSink {
  readonly write: (frame: WireFrame) => Effect.Effect<void, TransportIoError>;
  /**
   * Must tolerate being called more than once.
   */
  readonly close: (code: number, reason: string) => Effect.Effect<void>;
}

export interface InboundPort {
  /**
   * Queues a frame. A Close frame also marks the connection dead.
   */
  readonly frame: (frame: WireFrame) => Effect.Effect<void>;
  readonly fail: (error: TerminalError) => Effect.Effect<void>;
}

export interface FrameChannel {
  readonly connection: Connection;
  readonly inbound: InboundPort;
}

type Inbound = Either.Either<WireFrame, TerminalError>;

export const NORMAL_CLOSURE = 1000;

const closedLocally = ioError('close');

const takeInbound = (item: Inbound): Effect.Effect<WireFrame, TerminalError> =>
  Either.match(item, {
    onLeft: (error) => Effect.fail(error),
    onRight: (frame) => Effect.succeed(frame),
  });

const makeFrameChannelFrom =
  (sink: FrameSink) =>
  ({
    queue,
    terminal,
  }: {
    readonly queue: Queue.Queue<Inbound>;
    readonly terminal: Ref.Ref<Option.Option<TerminalError>>;
  }): FrameChannel => {
    // True only for the first terminal error; later ones are dropped.
    const markTerminal = (error: TerminalError) =>
      Ref.modify(terminal, (current) =>
        Option.isSome(current)
          ? ([false, current] as const)
          : ([true, Option.some(error)] as const)
      );

    const failWithTerminal = <A>(onAlive: () => Effect.Effect<A, TerminalError>) =>
      pipe(
        Ref.get(terminal),
        Effect.flatMap(
          Option.match({
            onNone: onAlive,
            onSome: (error) => Effect.fail(error),
          })
        )
      );

    const readFrame = pipe(
      Queue.poll(queue),
      Effect.flatMap(
        Option.match({
          onSome: takeInbound,
          onNone: () => failWithTerminal(() => Effect.flatMap(Queue.take(queue), takeInbound)),
        })
      )
    );

    const pollFrame = pipe(
      Queue.poll(queue),
      Effect.flatMap(
        Option.match({
          onSome: (item) => Effect.map(takeInbound(item), Option.some),
          onNone: () => failWithTerminal(() => Effect.succeed(Option.none<WireFrame>())),
        })
      )
    );

    const writeFrame = (frame: WireFrame) => failWithTerminal(() => sink.write(frame));

    const fail = (error: TerminalError) =>
      pipe(
        markTerminal(error),
        Effect.flatMap((first) => (first ? Queue.offer(queue, Either.left(error)) : Effect.void)),
        Effect.asVoid
      );

    const frame = (incoming: WireFrame) =>
      pipe(
        Ref.get(terminal),
        Effect.flatMap(
          Option.match({
            onSome: () => Effect.void,
            onNone: () =>
              pipe(
                Queue.offer(queue, Either.right(incoming)),
                Effect.zipRight(
                  incoming._tag === 'Close'
                    ? markTerminal(ConnectionClosedError.fromCloseFrame(incoming.code, incoming.reason))
                    : Effect.void
                ),
                Effect.asVoid
              ),
          })
        )
      );

    const close = (code: number = NORMAL_CLOSURE, reason: string = '') =>
      pipe(
        fail(closedLocally('Connection closed locally')),
        Effect.zipRight(sink.close(code, reason))
      );

    return {
      connection: {
        readFrame,
        pollFrame,
        writeFrame,
        close,
        isOpen: Effect.map(Ref.get(terminal), Option.isNone),
      },
      inbound: { frame, fail },
    };
  };

export const makeFrameChannel = (sink: FrameSink): Effect.Effect<FrameChannel> =>
  pipe(
    Effect.all({
      queue: Queue.unbounded<Inbound>(),
      terminal: Ref.make(Option.none<TerminalError>()),
    }),
    Effect.map(makeFrameChannelFrom(sink))
  );
