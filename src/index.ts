export { LiftApi, type ILiftApiDependencies } from './lift-communication/LiftApi';
export { ControlLoop, ControlLoopState, type IControlLoopConfig } from './lift-communication/core/ControlLoop';
export { Session, SessionState, type ISession, type ISessionConfig } from './lift-communication/core/Session';
export { Transport, type ITransport, type ITransportOptions } from './lift-communication/core/Transport';
export { LiftCodec, PROTOCOL_MAJOR_VERSION, PROTO_PATH } from './lift-communication/core/LiftMessages';
export type { ILiftCodec } from './lift-communication/core/ILiftInterfaces';
export { consoleLogger, type ILogger } from './lift-communication/core/Logger';
export {
  ConnectionError,
  DecodingError,
  EncodingError,
  HexLiftError,
  InvalidStateError,
  TransportError,
  ValidationError,
} from './lift-communication/core/Errors';
export * from './lift-communication/shared/DomainModels';
export {
  LiftApiConfigSchema,
  MAX_CONTROL_HZ,
  type LiftApiConfig,
  type LiftApiOptions,
} from './lift-communication/shared/LiftApiTypes';
export { convert, metersToPulses, pulsesToMeters, type LengthUnit } from './utils/units';
export { isWebSocketUrl, type IWebSocketURL } from './interfaces/IWebsocketUrl';
