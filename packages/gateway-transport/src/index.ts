/**
 * @gatewire/gateway-transport
 *
 * Contracts for the gateway transport: wire frames, decoded events, the error taxonomy,
 * connection interfaces, configuration and decode diagnostics.
 *
 * Implementations live in @gatewire/gateway-transport-websocket and
 * @gatewire/gateway-transport-inmemory.
 */

// ============================================================================
// Frames and Events
// ============================================================================

export {
  WireFrame,
  type CloseFrame,
  copyFrame,
  describeFrame,
} from './lib/frames';

export {
  type StructuredValue,
  type ReceiveMode,
  type ReceiptMetadata,
  type DecodedEvent,
  type ReceivedMessage,
  makeDecodedEvent,
} from './lib/events';

// ============================================================================
// Errors
// ============================================================================

export {
  CertificateValidationError,
  HandshakeFailureError,
  TransportIoError,
  MalformedPayloadError,
  EncodeError,
  ConnectionClosedError,
  type IoOperation,
  type TransportError,
  type TerminalError,
  type SendError,
  isTransportError,
  isTerminalError,
  ioError,
} from './lib/errors';

// ============================================================================
// Connections
// ============================================================================

export {
  type Connection,
  type ControlFrameStats,
  type GatewayConnection,
  GatewayConnector,
} from './lib/connection';

export {
  type FrameSink,
  type InboundPort,
  type FrameChannel,
  makeFrameChannel,
  NORMAL_CLOSURE,
} from './lib/frame-channel';

// ============================================================================
// Configuration and Diagnostics
// ============================================================================

export {
  type TlsBackend,
  type ClosePolicy,
  TrustAnchors,
  type GatewayConfigService,
  GatewayConfig,
  DEFAULT_FALLBACK_VALIDATION_NAME,
  defaultGatewayConfig,
  makeGatewayConfigLayer,
  makeGatewayConfigLive,
  GatewayConfigLive,
} from './lib/config';

export { DiagnosticSink, DiagnosticSinkLive, renderRaw } from './lib/diagnostics';
