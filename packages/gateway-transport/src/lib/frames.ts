/**
 * Wire Frames
 *
 * The five frame kinds a gateway connection exchanges. Data frames (Text, Binary) carry
 * payloads; control frames (Ping, Pong, Close) never reach the application.
 */

import { Data, Option, pipe } from 'effect';

export type WireFrame = Data.TaggedEnum<{
  Text: { readonly text: string };
  Binary: { readonly bytes: Uint8Array };
  Ping: { readonly bytes: Uint8Array };
  Pong: { readonly bytes: Uint8Array };
  Close: { readonly code: Option.Option<number>; readonly reason: string };
}>;

export const WireFrame = Data.taggedEnum<WireFrame>();

export type CloseFrame = Extract<WireFrame, { readonly _tag: 'Close' }>;

/**
 * Copies a frame so the copy shares no byte buffer with the original.
 */
export const copyFrame: (frame: WireFrame) => WireFrame = WireFrame.$match({
  Text: ({ text }) => WireFrame.Text({ text }),
  Binary: ({ bytes }) => WireFrame.Binary({ bytes: Uint8Array.from(bytes) }),
  Ping: ({ bytes }) => WireFrame.Ping({ bytes: Uint8Array.from(bytes) }),
  Pong: ({ bytes }) => WireFrame.Pong({ bytes: Uint8Array.from(bytes) }),
  Close: ({ code, reason }) => WireFrame.Close({ code, reason }),
});

export const describeFrame: (frame: WireFrame) => string = WireFrame.$match({
  Text: ({ text }) => `Text(${text.length} chars)`,
  Binary: ({ bytes }) => `Binary(${bytes.byteLength} bytes)`,
  Ping: ({ bytes }) => `Ping(${bytes.byteLength} bytes)`,
  Pong: ({ bytes }) => `Pong(${bytes.byteLength} bytes)`,
  Close: ({ code, reason }) =>
    `Close(${pipe(
      code,
      Option.map(String),
      Option.getOrElse(() => 'no code')
    )}${reason ? `, ${reason}` : ''})`,
});
