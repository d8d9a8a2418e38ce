/**
 * Connection Contracts
 *
 * Two levels of handle over one established gateway session:
 * - `Connection` moves raw wire frames,
 * - `GatewayConnection` wraps a `Connection` with the frame codec and moves structured values.
 *
 * Both are owned by a single fiber at a time. Nothing here locks.
 */

import { Context, type Effect, type Option, type Scope } from 'effect';
import type { SendError, TerminalError, TransportError } from './errors';
import type { ReceivedMessage, ReceiveMode, StructuredValue } from './events';
import type { WireFrame } from './frames';

// ============================================================================
// Frame-level Connection
// ============================================================================

export interface Connection {
  /**
   * Suspends until a frame arrives. Fails once the connection is dead and every frame
   * that arrived before its death has been read.
   */
  readonly readFrame: Effect.Effect<WireFrame, TerminalError>;

  /**
   * Returns immediately: `none` when nothing is queued.
   */
  readonly pollFrame: Effect.Effect<Option.Option<WireFrame>, TerminalError>;

  readonly writeFrame: (frame: WireFrame) => Effect.Effect<void, TerminalError>;

  /**
   * Closes the session. A receive pending on another fiber fails with a `TransportIoError`.
   */
  readonly close: (code?: number, reason?: string) => Effect.Effect<void>;

  readonly isOpen: Effect.Effect<boolean>;
}

// ============================================================================
// Decoded-value Connection
// ============================================================================

export interface ControlFrameStats {
  readonly pingsAnswered: number;
  readonly pongsReceived: number;
  readonly lastPongAt: Option.Option<Date>;
}

export interface GatewayConnection {
  readonly connection: Connection;

  /**
   * `blocking` suspends until a data frame is decoded; `polling` returns `none` when
   * nothing is queued. Control frames are consumed on the way and never returned.
   */
  readonly receiveDecoded: (
    mode: ReceiveMode
  ) => Effect.Effect<Option.Option<ReceivedMessage>, TerminalError>;

  readonly sendEncoded: (value: StructuredValue) => Effect.Effect<void, SendError>;

  readonly controlStats: Effect.Effect<ControlFrameStats>;

  readonly close: (code?: number, reason?: string) => Effect.Effect<void>;
}

// ============================================================================
// Connector Service
// ============================================================================

/**
 * Opens gateway connections. The connection lives as long as the surrounding scope.
 */
export class GatewayConnector extends Context.Tag('@gateway/GatewayConnector')<
  GatewayConnector,
  {
    readonly connect: (
      address: string
    ) => Effect.Effect<GatewayConnection, TransportError, Scope.Scope>;
  }
>() {}
