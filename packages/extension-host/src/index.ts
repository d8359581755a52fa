// morphir-extension-host - sandboxed WebAssembly extension runtime
export { ExtensionRegistry } from './extension/registry.js';
export type { RegistryOptions, LoadOutcome } from './extension/registry.js';
export { ExtensionContainer } from './container/container.js';
export type { ContainerOptions } from './container/container.js';
export { CachingLoader, githubReleaseUrl } from './loader/loader.js';
export type { ExtensionLoader, FetchFn, CachingLoaderOptions } from './loader/loader.js';

export {
  ExtensionConfigSchema,
  ExtensionSourceSchema,
  parseExtensionsConfig,
  loadHostConfig,
  defaultCacheDir,
} from './config.js';
export type { ExtensionConfig, ExtensionConfigInput, ExtensionSource, ConfigOutcome, HostConfig } from './config.js';

export { ExtensionError, SandboxError, isExtensionError, errorKindOf, EXTENSION_ERROR_KINDS } from './errors.js';
export type { ExtensionErrorKind, SandboxErrorKind } from './errors.js';
export { createLogger, defaultLogger } from './logger.js';
export type { Logger } from './logger.js';

export * from './extension/types.js';

export { JSONRPC_VERSION, Methods, ErrorCodes, RpcErrorSchema, RequestSchema } from './protocol/types.js';
export type {
  ExtensionMethod,
  RpcError,
  ExtensionRequest,
  ExtensionResponse,
  SuccessResponse,
  ErrorResponse,
  ResponseId,
} from './protocol/types.js';
export {
  createRequest,
  successResponse,
  errorResponse,
  isErrorResponse,
  unwrapResponse,
  encodeMessage,
  decodeResponse,
  decodeRequest,
  toRpcError,
} from './protocol/envelope.js';
export type { DecodedRequest } from './protocol/envelope.js';
export { ExtensionDispatcher } from './protocol/dispatcher.js';
export type { CapabilityHandler, DispatcherInfo } from './protocol/dispatcher.js';

export { HostFunctions, HostStatus } from './host-imports/host-functions.js';
export type { FileReadResult, HostFunctionsOptions, WorkspaceHostOptions } from './host-imports/host-functions.js';
export { IrCache, createHostState } from './host-imports/host-state.js';
export type { HostState } from './host-imports/host-state.js';
export { HOST_MODULE, HOST_IMPORT_NAMES, createHostImports } from './host-imports/morphir-imports.js';

export { VirtualPathConfig } from './vfs/virtual-paths.js';
export { FileSandbox } from './vfs/file-sandbox.js';
export type { FileSandboxOptions } from './vfs/file-sandbox.js';

export { GuestExports } from './execution/plugin.js';
export type { PluginInstance } from './execution/plugin.js';
export { ExecutionMeter } from './execution/meter.js';
export type { MeterLimits } from './execution/meter.js';
export { NodeAdapter } from './platform/node-adapter.js';
export type { PlatformAdapter } from './platform/adapter.js';
