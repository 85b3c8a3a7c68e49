// Export engine
export { ExportEngine, createExportEngine, isExportableEntry, isExportablePackage } from './core/engine/ExportEngine';
export * from './core/errors';
export * from './core/paths';
export { ConfigValidator, createConfigValidator, DEFAULT_PORT, PASSWORD_ENV_VAR } from './core/validators/ConfigValidator';

// API client
export { ConfigApiClient, createRequestTemplate, sendRequest } from './cli/clients/ConfigApiClient';
export { HttpsRequestExecutor } from './cli/clients/HttpsRequestExecutor';
export { LoggingRequestExecutor, withRequestLogging } from './cli/clients/LoggingRequestExecutor';
export { loadCertificateAuthority } from './cli/clients/certificates';

// Output
export { FileBundleWriter, serializeBundle } from './services/BundleWriter';
export { createCliLogger } from './services/logger';

// Export types
export type {
  ConfigPackage,
  ConnectionConfig,
  ExportBundle,
  ExportConfig,
  ExportSummary,
  HttpRequest,
  HttpResponse,
  IBundleWriter,
  IConfigApiClient,
  IExportEngine,
  RequestExecutor,
  ResponseTarget,
  StageFileEntry,
} from './core/engine/interfaces';
export type { RawExportOptions } from './core/validators/ConfigValidator';
export type { RequestTemplate } from './cli/clients/ConfigApiClient';
export type { TlsSettings } from './cli/clients/HttpsRequestExecutor';
