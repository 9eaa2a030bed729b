export {
  DRIVER_VERSION,
  isExecutableFile,
  locateInstalledPackage,
  resolveDriverBinary,
  versionedCachePath,
  type BundledPackageLocator,
  type ResolveDriverOptions,
} from "./binary-resolver.js";
export {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_START_TIMEOUT_MS,
  DEFAULT_STOP_TIMEOUT_MS,
  loadRuntimeConfig,
  type RuntimeConfig,
} from "./config.js";
export {
  Connection,
  type ConnectionOptions,
  type ConnectionState,
} from "./connection/connection.js";
export {
  createNativeTransport,
  createWsTransport,
  hasNativeWebSocket,
  transportFactoryFor,
  type Transport,
  type TransportCloseEvent,
  type TransportFactory,
  type TransportKind,
} from "./connection/transport.js";
export {
  ClosedError,
  ConfigError,
  ConnectionClosedError,
  ConnectionError,
  ProcessCrashedError,
  ProtocolError,
  ResolutionError,
  StartTimeoutError,
  TimeoutError,
  UnsupportedPlatformError,
  WheelhouseError,
} from "./errors.js";
export { createChildLogger, createRootLogger, getDefaultLogger } from "./logger.js";
export {
  detectPlatform,
  driverBinaryName,
  driverPackageName,
  resolveCacheRoot,
  type DriverArch,
  type DriverOs,
  type PlatformInfo,
} from "./platform.js";
export {
  DriverProcess,
  type DriverProcessState,
  type DriverStartOptions,
} from "./process/driver-process.js";
export {
  ProcessRegistry,
  getProcessRegistry,
  type ShutdownTarget,
  type SupervisedProcess,
} from "./process/process-registry.js";
export type { CommandParams, ErrorDescriptor } from "./protocol/messages.js";
export {
  ProtocolClient,
  type EventHandler,
  type ProtocolClientOptions,
  type ProtocolEvent,
  type SendOptions,
} from "./protocol/protocol-client.js";
export {
  Session,
  connectSession,
  launchSession,
  type ConnectSessionOptions,
  type LaunchSessionOptions,
} from "./session.js";
