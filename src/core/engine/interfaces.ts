/**
 * Core interfaces for the config export engine
 * These interfaces are shared between the CLI adapter and the engine
 */

/**
 * Connection settings for the config management API
 */
export interface ConnectionConfig {
  readonly host: string;
  readonly port: string;
  readonly caFile: string;
  readonly commonName: string;
  readonly username: string;
  readonly password: string;
}

/**
 * Complete, immutable configuration of one export run
 */
export interface ExportConfig {
  readonly connection: ConnectionConfig;
  readonly outputDir: string;
  readonly skipInternalPackages: boolean;
  readonly escapeFilePaths: boolean;
}

/**
 * A configuration package as listed by /v1/config/packages
 */
export interface ConfigPackage {
  name: string;
  activeStage: string;
}

/**
 * One entry of a stage listing
 */
export interface StageFileEntry {
  name: string;
  type: string;
}

/**
 * Files of one package, keyed by their path relative to the stage
 */
export interface ExportBundle {
  packageName: string;
  files: Record<string, string>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * A fully built request handed to a request executor.
 * path is already percent-encoded and goes on the wire unchanged.
 */
export interface HttpRequest {
  method: HttpMethod;
  origin: string;
  path: string;
  headers: Record<string, string>;
  body?: Buffer;
}

export function requestUrl(request: HttpRequest): string {
  return `${request.origin}${request.path}`;
}

export interface HttpResponse {
  statusCode: number;
  body: Buffer;
}

/**
 * Anything able to perform an HTTP request.
 * Decorators (logging) wrap another executor.
 */
export interface RequestExecutor {
  execute(request: HttpRequest): Promise<HttpResponse>;
  close?(): void;
}

/**
 * How the request helper treats a successful response body
 */
export type ResponseTarget =
  | { kind: 'json' }
  | { kind: 'raw' }
  | { kind: 'discard' };

/**
 * Read access to the config management API
 */
export interface IConfigApiClient {
  listPackages(): Promise<ConfigPackage[]>;
  listStageFiles(packageName: string, stage: string): Promise<StageFileEntry[]>;
  fetchFile(packageName: string, stage: string, fileName: string): Promise<Buffer>;
}

/**
 * Persists export bundles and returns where each one was written
 */
export interface IBundleWriter {
  write(bundle: ExportBundle): Promise<string>;
}

export interface ExportOptions {
  skipInternalPackages?: boolean;
}

export interface ExportSummary {
  packagesListed: number;
  packagesSkipped: number;
  packagesExported: number;
  filesExported: number;
  bundlePaths: string[];
}

/**
 * Main export engine interface
 */
export interface IExportEngine {
  run(options?: ExportOptions): Promise<ExportSummary>;
}

/**
 * Minimal logger shape used by the engine and adapters
 */
export interface ExportLogger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}
