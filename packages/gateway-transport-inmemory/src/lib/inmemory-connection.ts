/**
 * In-Memory Connection
 *
 * A `Connection` whose far end is scripted in-process. The peer pushes frames, drops the
 * link or closes it, and every frame the client writes is kept for inspection.
 *
 * Each read and write is also appended to an activity log (`read Ping`, `write Pong`, ...)
 * so tests can assert on ordering.
 */

import { Effect, Option, Ref, pipe } from 'effect';
import {
  type Connection,
  type TerminalError,
  WireFrame,
  ioError,
  makeFrameChannel,
} from '@gatewire/gateway-transport';

export interface InMemoryPeer {
  readonly send: (frame: WireFrame) => Effect.Effect<void>;
  readonly sendText: (text: string) => Effect.Effect<void>;
  readonly sendBinary: (bytes: Uint8Array) => Effect.Effect<void>;
  readonly ping: (bytes: Uint8Array) => Effect.Effect<void>;
  readonly close: (code: number, reason: string) => Effect.Effect<void>;
  /**
   * Drops the link without a Close frame.
   */
  readonly drop: (error?: TerminalError) => Effect.Effect<void>;
  readonly written: Effect.Effect<readonly WireFrame[]>;
  readonly activity: Effect.Effect<readonly string[]>;
  readonly closedWith: Effect.Effect<Option.Option<{ readonly code: number; readonly reason: string }>>;
}

export interface InMemoryConnectionOptions {
  readonly failWrites?: boolean;
}

export interface InMemoryConnection {
  readonly connection: Connection;
  readonly peer: InMemoryPeer;
}

const append =
  <A>(ref: Ref.Ref<readonly A[]>) =>
  (item: A) =>
    Ref.update(ref, (items) => [...items, item]);

export const makeInMemoryConnection = (
  options: InMemoryConnectionOptions = {}
): Effect.Effect<InMemoryConnection> =>
  pipe(
    Effect.all({
      written: Ref.make<readonly WireFrame[]>([]),
      activity: Ref.make<readonly string[]>([]),
      closedWith: Ref.make(Option.none<{ readonly code: number; readonly reason: string }>()),
    }),
    Effect.flatMap(({ written, activity, closedWith }) =>
      pipe(
        makeFrameChannel({
          write: (frame) =>
            options.failWrites
              ? Effect.fail(ioError('write')('In-memory link refused the write'))
              : pipe(
                  append(written)(frame),
                  Effect.zipRight(append(activity)(`write ${frame._tag}`))
                ),
          close: (code, reason) =>
            Ref.update(closedWith, Option.orElse(() => Option.some({ code, reason }))),
        }),
        Effect.map(({ connection, inbound }): InMemoryConnection => {
          const recordRead = (frame: WireFrame) => append(activity)(`read ${frame._tag}`);

          return {
            connection: {
              ...connection,
              readFrame: Effect.tap(connection.readFrame, recordRead),
              pollFrame: Effect.tap(
                connection.pollFrame,
                Option.match({
                  onNone: () => Effect.void,
                  onSome: recordRead,
                })
              ),
            },
            peer: {
              send: inbound.frame,
              sendText: (text) => inbound.frame(WireFrame.Text({ text })),
              sendBinary: (bytes) => inbound.frame(WireFrame.Binary({ bytes })),
              ping: (bytes) => inbound.frame(WireFrame.Ping({ bytes })),
              close: (code, reason) =>
                inbound.frame(WireFrame.Close({ code: Option.some(code), reason })),
              drop: (error) =>
                inbound.fail(error ?? ioError('read')('In-memory link dropped')),
              written: Ref.get(written),
              activity: Ref.get(activity),
              closedWith: Ref.get(closedWith),
            },
          };
        })
      )
    )
  );
