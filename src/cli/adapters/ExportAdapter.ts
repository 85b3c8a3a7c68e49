/**
 * Export Adapter - bridges the command line with the export engine
 * Owns the single place where failures turn into log lines and exit codes
 */

import { ConfigApiClient, DiagnosticSink } from '../clients/ConfigApiClient';
import { HttpsRequestExecutor, TlsSettings } from '../clients/HttpsRequestExecutor';
import { LineSink, withRequestLogging } from '../clients/LoggingRequestExecutor';
import { loadCertificateAuthority } from '../clients/certificates';
import { loadConfigFile } from '../config/ConfigFileLoader';
import { createExportEngine } from '../../core/engine/ExportEngine';
import { ExportLogger, RequestExecutor } from '../../core/engine/interfaces';
import {
  ConfigurationError,
  EXIT_SUCCESS,
  errorMessage,
  exitCodeFor,
} from '../../core/errors';
import {
  ConfigValidator,
  RawExportOptions,
  createConfigValidator,
} from '../../core/validators/ConfigValidator';
import { FileBundleWriter } from '../../services/BundleWriter';

export interface CliExportOptions extends RawExportOptions {
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export interface ExportAdapterDependencies {
  logger: ExportLogger;
  env?: NodeJS.ProcessEnv;
  validator?: ConfigValidator;
  createExecutor?: (tls: TlsSettings) => RequestExecutor;
  printRequest?: LineSink;
  diagnostics?: DiagnosticSink;
}

export class ExportAdapter {
  private readonly logger: ExportLogger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly validator: ConfigValidator;
  private readonly createExecutor: (tls: TlsSettings) => RequestExecutor;

  constructor(private readonly deps: ExportAdapterDependencies) {
    this.logger = deps.logger;
    this.env = deps.env ?? process.env;
    this.validator = deps.validator ?? createConfigValidator();
    this.createExecutor = deps.createExecutor ?? (tls => new HttpsRequestExecutor(tls));
  }

  /**
   * Run one export and return the process exit code
   */
  async execute(options: CliExportOptions): Promise<number> {
    let executor: RequestExecutor | undefined;

    try {
      const fromFile = options.config ? await loadConfigFile(options.config) : {};
      const config = this.validator.validate(this.validator.merge(fromFile, options), this.env);
      const { connection } = config;

      const ca = await loadCertificateAuthority(connection.caFile);
      executor = withRequestLogging(
        this.createExecutor({ ca, servername: connection.commonName }),
        this.deps.printRequest
      );

      const client = new ConfigApiClient(executor, connection, {
        escapeFilePaths: config.escapeFilePaths,
        diagnostics: this.deps.diagnostics,
      });
      const engine = createExportEngine(client, new FileBundleWriter(config.outputDir), this.logger);

      this.logger.debug(`Exporting from ${connection.host}:${connection.port} as ${connection.username}`);
      const summary = await engine.run({ skipInternalPackages: config.skipInternalPackages });

      this.logger.info(
        `Exported ${summary.filesExported} file(s) from ${summary.packagesExported} of ` +
          `${summary.packagesListed} package(s)`
      );
      return EXIT_SUCCESS;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.logger.error(error.message);
      } else {
        this.logger.error(`Export failed: ${errorMessage(error)}`);
      }
      return exitCodeFor(error);
    } finally {
      executor?.close?.();
    }
  }
}
