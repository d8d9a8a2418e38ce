/**
 * @gatewire/gateway-transport-websocket
 *
 * Gateway connections over secure WebSockets: address parsing and validation-name
 * derivation, the pluggable secure transport, the `ws` upgrade and the frame codec.
 */

// ============================================================================
// Establishment
// ============================================================================

export {
  connect,
  parseAddress,
  type GatewayAddress,
  GatewayConnectorLive,
  GatewayTransportLive,
  makeGatewayTransportLayer,
} from './lib/establish';

export { ValidationName, deriveValidationName, stripBrackets } from './lib/validation-name';

export {
  SecureTransport,
  type TransportTarget,
  makeNodeTlsTransport,
  plaintextTransport,
  NodeTlsTransportLive,
  PlaintextTransportLive,
  SecureTransportLive,
} from './lib/secure-transport';

export { upgradeConnection } from './lib/ws-connection';

// ============================================================================
// Codec
// ============================================================================

export { makeGatewayConnection, decodeText, decodeBinary, encodeValue } from './lib/codec';

export { makeControlFrameHandler, type ControlFrameHandler } from './lib/control-frames';

// ============================================================================
// Error Classification
// ============================================================================

export {
  classifyTlsFailure,
  classifyHandshakeFailure,
  classifyStreamFailure,
  classifyClose,
  unexpectedResponse,
  isCertificateErrorCode,
  ABNORMAL_CLOSURE,
  NO_STATUS_RECEIVED,
} from './lib/classify';
