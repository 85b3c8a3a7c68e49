/**
 * Config API Client - talks to the /v1/config endpoints with Basic auth
 * One request per call, no retries
 */

import {
  ConfigPackage,
  ConnectionConfig,
  HttpMethod,
  HttpRequest,
  IConfigApiClient,
  RequestExecutor,
  ResponseTarget,
  StageFileEntry,
} from '../../core/engine/interfaces';
import { BadHttpStatusError, ResponseDecodeError, errorMessage } from '../../core/errors';
import { filePath, packagesPath, stagePath } from '../../core/paths';

/**
 * Immutable request template every call is cloned from
 */
export interface RequestTemplate {
  readonly origin: string;
  readonly headers: Readonly<Record<string, string>>;
}

export function createRequestTemplate(connection: ConnectionConfig): RequestTemplate {
  const credentials = Buffer.from(`${connection.username}:${connection.password}`).toString('base64');

  return Object.freeze({
    origin: `https://${connection.host}:${connection.port}`,
    headers: Object.freeze({ Authorization: `Basic ${credentials}` }),
  });
}

export type DiagnosticSink = (body: Buffer) => void;

const writeToStderr: DiagnosticSink = body => {
  process.stderr.write(body);
};

/**
 * Build a request from the template, run it and handle the response
 * according to target. Non-200 bodies go to the diagnostic sink.
 */
export async function sendRequest(
  executor: RequestExecutor,
  template: RequestTemplate,
  method: HttpMethod,
  path: string,
  body: unknown,
  target: { kind: 'json' },
  diagnostics?: DiagnosticSink
): Promise<unknown>;
export async function sendRequest(
  executor: RequestExecutor,
  template: RequestTemplate,
  method: HttpMethod,
  path: string,
  body: unknown,
  target: { kind: 'raw' },
  diagnostics?: DiagnosticSink
): Promise<Buffer>;
export async function sendRequest(
  executor: RequestExecutor,
  template: RequestTemplate,
  method: HttpMethod,
  path: string,
  body: unknown,
  target: { kind: 'discard' },
  diagnostics?: DiagnosticSink
): Promise<void>;
export async function sendRequest(
  executor: RequestExecutor,
  template: RequestTemplate,
  method: HttpMethod,
  path: string,
  body: unknown,
  target: ResponseTarget,
  diagnostics: DiagnosticSink = writeToStderr
): Promise<unknown> {
  const request: HttpRequest = {
    method,
    origin: template.origin,
    path,
    headers: { ...template.headers },
  };

  if (body !== undefined) {
    request.body = Buffer.from(`${JSON.stringify(body)}\n`);
    request.headers['Content-Type'] = 'application/json';
  }

  const response = await executor.execute(request);

  if (response.statusCode !== 200) {
    diagnostics(response.body);
    throw new BadHttpStatusError(response.statusCode);
  }

  switch (target.kind) {
    case 'raw':
      return response.body;
    case 'json':
      try {
        return JSON.parse(response.body.toString('utf-8'));
      } catch (error) {
        throw new ResponseDecodeError(`Invalid JSON response from ${path}: ${errorMessage(error)}`);
      }
    case 'discard':
      return undefined;
  }
}

/**
 * Read the "results" array of an API response; absent results read as empty
 */
function resultsOf(document: unknown, path: string): Record<string, unknown>[] {
  // A null document decodes like an empty object
  if (document === null) {
    return [];
  }
  if (!isRecord(document)) {
    throw new ResponseDecodeError(`Unexpected response from ${path}: expected an object`);
  }

  const results = document.results;
  if (results === undefined || results === null) {
    return [];
  }
  if (!Array.isArray(results)) {
    throw new ResponseDecodeError(`Unexpected response from ${path}: "results" is not an array`);
  }

  return results.map(result => {
    if (!isRecord(result)) {
      throw new ResponseDecodeError(`Unexpected response from ${path}: result is not an object`);
    }
    return result;
  });
}

function stringField(result: Record<string, unknown>, field: string, path: string): string {
  const value = result[field];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new ResponseDecodeError(`Unexpected response from ${path}: "${field}" is not a string`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodePackages(document: unknown, path: string): ConfigPackage[] {
  return resultsOf(document, path).map(result => ({
    name: stringField(result, 'name', path),
    activeStage: stringField(result, 'active-stage', path),
  }));
}

export function decodeStageFiles(document: unknown, path: string): StageFileEntry[] {
  return resultsOf(document, path).map(result => ({
    name: stringField(result, 'name', path),
    type: stringField(result, 'type', path),
  }));
}

export interface ConfigApiClientOptions {
  escapeFilePaths?: boolean;
  diagnostics?: DiagnosticSink;
}

export class ConfigApiClient implements IConfigApiClient {
  private readonly template: RequestTemplate;

  constructor(
    private readonly executor: RequestExecutor,
    connection: ConnectionConfig,
    private readonly options: ConfigApiClientOptions = {}
  ) {
    this.template = createRequestTemplate(connection);
  }

  async listPackages(): Promise<ConfigPackage[]> {
    const path = packagesPath();
    const document = await this.get(path, { kind: 'json' });
    return decodePackages(document, path);
  }

  async listStageFiles(packageName: string, stage: string): Promise<StageFileEntry[]> {
    const path = stagePath(packageName, stage);
    const document = await this.get(path, { kind: 'json' });
    return decodeStageFiles(document, path);
  }

  fetchFile(packageName: string, stage: string, fileName: string): Promise<Buffer> {
    const path = filePath(packageName, stage, fileName, this.options.escapeFilePaths);
    return sendRequest(
      this.executor,
      this.template,
      'GET',
      path,
      undefined,
      { kind: 'raw' },
      this.options.diagnostics
    );
  }

  private get(path: string, target: { kind: 'json' }): Promise<unknown> {
    return sendRequest(this.executor, this.template, 'GET', path, undefined, target, this.options.diagnostics);
  }
}
