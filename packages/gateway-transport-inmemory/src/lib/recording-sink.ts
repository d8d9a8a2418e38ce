import { Context, Effect, Layer, Ref, pipe } from 'effect';
import { DiagnosticSink, type MalformedPayloadError } from '@gatewire/gateway-transport';

export interface RecordingDiagnosticSink {
  readonly sink: Context.Tag.Service<typeof DiagnosticSink>;
  readonly layer: Layer.Layer<DiagnosticSink>;
  readonly recorded: Effect.Effect<readonly MalformedPayloadError[]>;
}

/**
 * A diagnostic sink that keeps every reported payload failure in memory.
 */
export const makeRecordingDiagnosticSink: Effect.Effect<RecordingDiagnosticSink> = pipe(
  Ref.make<readonly MalformedPayloadError[]>([]),
  Effect.map((ref) => {
    const sink: Context.Tag.Service<typeof DiagnosticSink> = {
      malformedPayload: (error) => Ref.update(ref, (errors) => [...errors, error]),
    };
    return {
      sink,
      layer: Layer.succeed(DiagnosticSink, sink),
      recorded: Ref.get(ref),
    };
  })
);
