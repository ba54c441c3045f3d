export { Connection } from "./connection.js";
export type {
  CommandCallback,
  ConnectCallback,
  ConnectionOptions,
  OperationOptions,
  Ownership,
  QueryCallback,
  RemoveOptions,
  UpdateOptions,
  WriteCallback,
} from "./connection.js";
export { Deferred } from "./bridge/deferred.js";
export type {
  DeferredCommand,
  DeferredConnect,
  DeferredInsert,
  DeferredQuery,
  DeferredRemove,
  DeferredState,
  DeferredUpdate,
} from "./bridge/deferred.js";
export { SerialContext } from "./bridge/context.js";
export type { ExecutionContext, Task } from "./bridge/context.js";
export type { OperationCallback } from "./bridge/delivery.js";
export type { CommandResult, Cursor, Driver } from "./driver/types.js";
export { Value, fromPlain, isValue, toPlain, valuesEqual } from "./value/value.js";
export type {
  ConversionOptions,
  DocumentInput,
  PlainOutput,
  ValueKind,
} from "./value/value.js";
export { WireDocument, WireDocumentBuilder } from "./value/wire.js";
export type { WireElement, WireField, WireKind } from "./value/wire.js";
export { decode, encode } from "./value/convert.js";
export {
  AddressError,
  BridgeError,
  CommandFailedError,
  ConfigError,
  ConnectFailureError,
  ConnectionLostError,
  ConversionError,
  DriverError,
  LastErrorReported,
  NotConnectedError,
} from "./shared/errors.js";
export type { BridgeErrorCode } from "./shared/errors.js";
export { formatAddress, parseAddress } from "./shared/net.js";
export type { ServerAddress } from "./shared/net.js";
export { getLogger, initLogger, setLogger } from "./shared/logging.js";
export type { LogFormat, LogLevel, Logger } from "./shared/logging.js";
export {
  DEFAULT_CONFIG,
  configureLogging,
  readConfigFile,
  resolveConfig,
} from "./config.js";
export type { BridgeConfig, ConfigFile, ResolveConfigOptions } from "./config.js";
export { VERSION } from "./shared/constants.js";
