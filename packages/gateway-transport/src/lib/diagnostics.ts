/**
 * Decode Diagnostics
 *
 * Payloads that fail to decode are reported here with their raw bytes, so they can be
 * inspected after the fact. The live sink writes a warning log; tests swap in a
 * recording sink.
 */

import { Context, Effect, Layer, pipe } from 'effect';
import type { MalformedPayloadError } from './errors';

export class DiagnosticSink extends Context.Tag('@gateway/DiagnosticSink')<
  DiagnosticSink,
  {
    readonly malformedPayload: (error: MalformedPayloadError) => Effect.Effect<void>;
  }
>() {}

export const renderRaw = (raw: string | Uint8Array): string =>
  typeof raw === 'string'
    ? raw
    : Array.from(raw, (byte) => byte.toString(16).padStart(2, '0')).join('');

export const DiagnosticSinkLive = Layer.succeed(DiagnosticSink, {
  malformedPayload: (error) =>
    pipe(
      Effect.logWarning(`Failed to decode ${error.kind} payload: ${error.message}`),
      Effect.annotateLogs({
        kind: error.kind,
        raw: renderRaw(error.raw),
      })
    ),
});
