/**
 * Decoded Events
 *
 * What the receive path hands to the dispatch layer: the decode result plus optional
 * receipt metadata.
 */

import { Clock, Effect, type Either, Option, pipe } from 'effect';
import type { MalformedPayloadError } from './errors';
import { copyFrame, type WireFrame } from './frames';

/**
 * An application-level value (map/array/scalar tree) decoded from a frame payload.
 */
export type StructuredValue = unknown;

export type ReceiveMode = 'blocking' | 'polling';

export interface ReceiptMetadata {
  readonly receivedAt: Date;
  readonly monotonicNanos: bigint;
  readonly frame: WireFrame;
}

export interface DecodedEvent {
  readonly receipt: Option.Option<ReceiptMetadata>;
}

export interface ReceivedMessage {
  readonly event: DecodedEvent;
  readonly result: Either.Either<StructuredValue, MalformedPayloadError>;
}

const noReceipt: DecodedEvent = { receipt: Option.none() };

/**
 * Stamps a frame with wall-clock and monotonic time and keeps a private copy of it.
 * When capture is off nothing is read or copied.
 */
export const makeDecodedEvent = (
  frame: WireFrame,
  captureReceipts: boolean
): Effect.Effect<DecodedEvent> =>
  captureReceipts
    ? pipe(
        Effect.all({
          millis: Clock.currentTimeMillis,
          nanos: Clock.currentTimeNanos,
        }),
        Effect.map(
          ({ millis, nanos }): DecodedEvent => ({
            receipt: Option.some({
              receivedAt: new Date(millis),
              monotonicNanos: nanos,
              frame: copyFrame(frame),
            }),
          })
        )
      )
    : Effect.succeed(noReceipt);
