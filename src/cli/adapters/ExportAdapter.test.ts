import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliExportOptions, ExportAdapter } from './ExportAdapter';
import { HttpRequest, HttpResponse } from '../../core/engine/interfaces';

const CA_FIXTURE = path.join(__dirname, '..', 'clients', '__fixtures__', 'ca.pem');
const INVALID_CA_FIXTURE = path.join(__dirname, '..', 'clients', '__fixtures__', 'invalid-ca.pem');

const json = (value: unknown): HttpResponse => ({ statusCode: 200, body: Buffer.from(JSON.stringify(value)) });

/**
 * Executor serving fixed responses by request path; unknown paths get a 404
 */
function routeExecutor(routes: Record<string, HttpResponse>) {
  return {
    execute: jest.fn(async (request: HttpRequest): Promise<HttpResponse> => {
      return routes[request.path] ?? { statusCode: 404, body: Buffer.from('not found') };
    }),
    close: jest.fn(),
  };
}

describe('ExportAdapter', () => {
  let dir: string;
  let logger: { error: jest.Mock; warn: jest.Mock; info: jest.Mock; debug: jest.Mock };
  let printRequest: jest.Mock;
  let diagnostics: jest.Mock;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'export-adapter-'));
    logger = { error: jest.fn(), warn: jest.fn(), info: jest.fn(), debug: jest.fn() };
    printRequest = jest.fn();
    diagnostics = jest.fn();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const options = (overrides: CliExportOptions = {}): CliExportOptions => ({
    host: 'icinga.test',
    ca: CA_FIXTURE,
    cn: 'icinga',
    user: 'export',
    output: dir,
    ...overrides,
  });

  const createAdapter = (
    executor: ReturnType<typeof routeExecutor>,
    env: NodeJS.ProcessEnv = { I2_PASS: 'test-secret' }
  ) => {
    const createExecutor = jest.fn(() => executor);
    const adapter = new ExportAdapter({ logger, env, createExecutor, printRequest, diagnostics });
    return { adapter, createExecutor };
  };

  const apiRoutes = {
    '/v1/config/packages': json({
      results: [
        { name: 'my pkg', 'active-stage': 'stage-1' },
        { name: 'no-stage', 'active-stage': '' },
      ],
    }),
    '/v1/config/stages/my%20pkg/stage-1': json({
      results: [
        { name: 'conf.d', type: 'directory' },
        { name: 'include.conf', type: 'file' },
        { name: 'conf.d/hosts.conf', type: 'file' },
      ],
    }),
    '/v1/config/files/my%20pkg/stage-1/conf.d/hosts.conf': {
      statusCode: 200,
      body: Buffer.from('object Host "web" {}\n'),
    },
  };

  it('should export packages and exit with 0', async () => {
    const executor = routeExecutor(apiRoutes);
    const { adapter, createExecutor } = createAdapter(executor);

    await expect(adapter.execute(options())).resolves.toBe(0);

    await expect(fs.readFile(path.join(dir, 'my%20pkg.json'), 'utf-8')).resolves.toBe(
      '{"files":{"conf.d/hosts.conf":"object Host \\"web\\" {}\\n"}}\n'
    );
    expect(await fs.readdir(dir)).toEqual(['my%20pkg.json']);
    expect(printRequest.mock.calls).toEqual([
      ['GET https://icinga.test:5665/v1/config/packages'],
      ['GET https://icinga.test:5665/v1/config/stages/my%20pkg/stage-1'],
      ['GET https://icinga.test:5665/v1/config/files/my%20pkg/stage-1/conf.d/hosts.conf'],
    ]);
    expect(createExecutor).toHaveBeenCalledWith({
      ca: [expect.stringContaining('-----BEGIN CERTIFICATE-----')],
      servername: 'icinga',
    });
    expect(logger.info).toHaveBeenLastCalledWith('Exported 1 file(s) from 1 of 2 package(s)');
    expect(executor.close).toHaveBeenCalledTimes(1);
  });

  it('should send Basic auth on every request', async () => {
    const executor = routeExecutor(apiRoutes);
    const { adapter } = createAdapter(executor);

    await adapter.execute(options());

    const headers = executor.execute.mock.calls.map(([request]) => request.headers.Authorization);
    expect(headers).toEqual([
      'Basic ZXhwb3J0OnRlc3Qtc2VjcmV0',
      'Basic ZXhwb3J0OnRlc3Qtc2VjcmV0',
      'Basic ZXhwb3J0OnRlc3Qtc2VjcmV0',
    ]);
  });

  it('should exit with 2 before any request when a flag is missing', async () => {
    const executor = routeExecutor(apiRoutes);
    const { adapter, createExecutor } = createAdapter(executor);

    await expect(adapter.execute(options({ cn: '' }))).resolves.toBe(2);

    expect(logger.error).toHaveBeenCalledWith('-cn missing');
    expect(createExecutor).not.toHaveBeenCalled();
    expect(executor.execute).not.toHaveBeenCalled();
  });

  it('should exit with 2 when the password is not set', async () => {
    const executor = routeExecutor(apiRoutes);
    const { adapter, createExecutor } = createAdapter(executor, {});

    await expect(adapter.execute(options())).resolves.toBe(2);

    expect(logger.error).toHaveBeenCalledWith('$I2_PASS missing');
    expect(createExecutor).not.toHaveBeenCalled();
  });

  it('should exit with 1 when the CA bundle has no certificate', async () => {
    const executor = routeExecutor(apiRoutes);
    const { adapter, createExecutor } = createAdapter(executor);

    await expect(adapter.execute(options({ ca: INVALID_CA_FIXTURE }))).resolves.toBe(1);

    expect(logger.error).toHaveBeenCalledWith('Export failed: bad CA cert');
    expect(createExecutor).not.toHaveBeenCalled();
  });

  it('should exit with 1 and write nothing on a bad status', async () => {
    const executor = routeExecutor({
      ...apiRoutes,
      '/v1/config/files/my%20pkg/stage-1/conf.d/hosts.conf': {
        statusCode: 500,
        body: Buffer.from('Internal Server Error'),
      },
    });
    const { adapter } = createAdapter(executor);

    await expect(adapter.execute(options())).resolves.toBe(1);

    expect(logger.error).toHaveBeenCalledWith('Export failed: HTTP 500');
    expect(diagnostics).toHaveBeenCalledWith(Buffer.from('Internal Server Error'));
    expect(await fs.readdir(dir)).toEqual([]);
    expect(executor.close).toHaveBeenCalledTimes(1);
  });

  it('should exit with 1 on transport errors', async () => {
    const executor = routeExecutor(apiRoutes);
    executor.execute.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5665'));
    const { adapter } = createAdapter(executor);

    await expect(adapter.execute(options())).resolves.toBe(1);

    expect(logger.error).toHaveBeenCalledWith('Export failed: connect ECONNREFUSED 127.0.0.1:5665');
  });

  it('should take defaults from a config file and let flags override them', async () => {
    const configPath = path.join(dir, 'export.yaml');
    await fs.writeFile(configPath, `host: from-file.test\nport: 5666\ncn: icinga\nuser: export\nca: ${CA_FIXTURE}\n`);
    const output = path.join(dir, 'out');
    const executor = routeExecutor({});
    const { adapter } = createAdapter(executor);

    await expect(adapter.execute({ config: configPath, host: 'icinga.test', output })).resolves.toBe(1);

    expect(printRequest).toHaveBeenCalledWith('GET https://icinga.test:5666/v1/config/packages');
    expect(logger.error).toHaveBeenCalledWith('Export failed: HTTP 404');
  });

  it('should exit with 2 on an unreadable config file', async () => {
    const { adapter } = createAdapter(routeExecutor(apiRoutes));

    await expect(adapter.execute(options({ config: path.join(dir, 'missing.yaml') }))).resolves.toBe(2);
  });
});
