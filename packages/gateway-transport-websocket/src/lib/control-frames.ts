/**
 * Control-Frame Handler
 *
 * Answers every Ping with a Pong carrying the same payload and records Pong arrivals.
 * It reacts to inbound frames only; scheduling heartbeats is left to the caller, which can
 * read `stats` to see when the peer last acknowledged.
 */

import { Clock, Effect, Option, Ref, pipe } from 'effect';
import {
  type Connection,
  type ControlFrameStats,
  type TerminalError,
  WireFrame,
} from '@gatewire/gateway-transport';

export interface ControlFrameHandler {
  readonly onPing: (bytes: Uint8Array) => Effect.Effect<void, TerminalError>;
  readonly onPong: (bytes: Uint8Array) => Effect.Effect<void>;
  readonly stats: Effect.Effect<ControlFrameStats>;
}

const initialStats: ControlFrameStats = {
  pingsAnswered: 0,
  pongsReceived: 0,
  lastPongAt: Option.none(),
};

export const makeControlFrameHandler = (connection: Connection): Effect.Effect<ControlFrameHandler> =>
  pipe(
    Ref.make(initialStats),
    Effect.map((stats) => ({
      onPing: (bytes) =>
        pipe(
          connection.writeFrame(WireFrame.Pong({ bytes })),
          Effect.zipRight(
            Ref.update(stats, (current) => ({
              ...current,
              pingsAnswered: current.pingsAnswered + 1,
            }))
          )
        ),
      onPong: () =>
        pipe(
          Clock.currentTimeMillis,
          Effect.flatMap((now) =>
            Ref.update(stats, (current) => ({
              ...current,
              pongsReceived: current.pongsReceived + 1,
              lastPongAt: Option.some(new Date(now)),
            }))
          )
        ),
      stats: Ref.get(stats),
    }))
  );
