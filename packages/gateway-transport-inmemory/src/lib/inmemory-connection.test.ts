/**
 * In-Memory Connection Tests
 *
 * The scripted peer is what the codec tests stand on, so its recording has to be exact.
 */

import { describe, it, expect } from '@effect/vitest';
import { Effect, Option, pipe } from 'effect';
import { WireFrame } from '@gatewire/gateway-transport';
import { makeInMemoryConnection } from './inmemory-connection';

describe('makeInMemoryConnection', () => {
  it.effect('should record reads and writes in order', () =>
    pipe(
      makeInMemoryConnection(),
      Effect.tap(({ peer }) => peer.sendText('{"op":10}')),
      Effect.tap(({ connection }) => connection.readFrame),
      Effect.tap(({ connection }) => connection.writeFrame(WireFrame.Text({ text: '{"op":1}' }))),
      Effect.tap(({ connection }) => connection.pollFrame),
      Effect.flatMap(({ peer }) => Effect.all({ activity: peer.activity, written: peer.written })),
      Effect.map(({ activity, written }) => {
        expect(activity).toEqual(['read Text', 'write Text']);
        expect(written).toEqual([WireFrame.Text({ text: '{"op":1}' })]);
      })
    )
  );

  it.effect('should refuse writes when configured to', () =>
    pipe(
      makeInMemoryConnection({ failWrites: true }),
      Effect.flatMap(({ connection }) =>
        Effect.flip(connection.writeFrame(WireFrame.Text({ text: '{}' })))
      ),
      Effect.map((error) => {
        expect(error._tag).toBe('TransportIoError');
        expect(error.message).toBe('In-memory link refused the write');
      })
    )
  );

  it.effect('should remember only the first local close', () =>
    pipe(
      makeInMemoryConnection(),
      Effect.tap(({ connection }) => connection.close(4000, 'first')),
      Effect.tap(({ connection }) => connection.close()),
      Effect.flatMap(({ peer }) => peer.closedWith),
      Effect.map((closedWith) => {
        expect(closedWith).toEqual(Option.some({ code: 4000, reason: 'first' }));
      })
    )
  );

  it.effect('should turn a peer close into a close frame', () =>
    pipe(
      makeInMemoryConnection(),
      Effect.tap(({ peer }) => peer.close(4000, 'bye')),
      Effect.flatMap(({ connection }) => connection.readFrame),
      Effect.map((frame) => {
        expect(frame).toEqual(WireFrame.Close({ code: Option.some(4000), reason: 'bye' }));
      })
    )
  );

  it.effect('should fail reads after the link drops', () =>
    pipe(
      makeInMemoryConnection(),
      Effect.tap(({ peer }) => peer.drop()),
      Effect.flatMap(({ connection }) => Effect.flip(connection.readFrame)),
      Effect.map((error) => {
        expect(error._tag).toBe('TransportIoError');
        expect(error.message).toBe('In-memory link dropped');
      })
    )
  );
});
