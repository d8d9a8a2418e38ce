/**
 * @gatewire/gateway-transport-inmemory
 *
 * An in-process `Connection` with a scriptable peer, and a recording diagnostic sink.
 * Drives the frame codec without a socket.
 */

export {
  makeInMemoryConnection,
  type InMemoryConnection,
  type InMemoryConnectionOptions,
  type InMemoryPeer,
} from './lib/inmemory-connection';

export { makeRecordingDiagnosticSink, type RecordingDiagnosticSink } from './lib/recording-sink';
