/**
 * Core export engine
 * Lists packages, walks each active stage and writes one bundle per package.
 * The first error aborts the run; bundles already written stay on disk.
 */

import {
  ConfigPackage,
  ExportBundle,
  ExportLogger,
  ExportOptions,
  ExportSummary,
  IBundleWriter,
  IConfigApiClient,
  IExportEngine,
  StageFileEntry,
} from './interfaces';

const silentLogger: ExportLogger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};

/**
 * Whether a stage entry is exported: regular files below the stage root only
 */
export function isExportableEntry(entry: StageFileEntry): boolean {
  return entry.type === 'file' && entry.name.includes('/');
}

/**
 * Whether a listed package is exported at all
 */
export function isExportablePackage(pkg: ConfigPackage, options: ExportOptions = {}): boolean {
  if (pkg.name === '' || pkg.activeStage === '') {
    return false;
  }
  if (options.skipInternalPackages && pkg.name.startsWith('_')) {
    return false;
  }
  return true;
}

export class ExportEngine implements IExportEngine {
  constructor(
    private readonly client: IConfigApiClient,
    private readonly writer: IBundleWriter,
    private readonly logger: ExportLogger = silentLogger
  ) {}

  async run(options: ExportOptions = {}): Promise<ExportSummary> {
    const summary: ExportSummary = {
      packagesListed: 0,
      packagesSkipped: 0,
      packagesExported: 0,
      filesExported: 0,
      bundlePaths: [],
    };

    const packages = await this.client.listPackages();
    summary.packagesListed = packages.length;

    for (const pkg of packages) {
      if (!isExportablePackage(pkg, options)) {
        this.logger.debug(`Skipping package "${pkg.name}" (stage "${pkg.activeStage}")`);
        summary.packagesSkipped++;
        continue;
      }

      const bundle = await this.collectBundle(pkg);
      const fileCount = Object.keys(bundle.files).length;

      if (fileCount === 0) {
        this.logger.debug(`Package "${pkg.name}" has no files to export`);
        continue;
      }

      const bundlePath = await this.writer.write(bundle);
      this.logger.info(`Wrote ${fileCount} file(s) of package "${pkg.name}" to ${bundlePath}`);

      summary.packagesExported++;
      summary.filesExported += fileCount;
      summary.bundlePaths.push(bundlePath);
    }

    return summary;
  }

  /**
   * Fetch every exportable file of a package's active stage
   */
  private async collectBundle(pkg: ConfigPackage): Promise<ExportBundle> {
    const entries = await this.client.listStageFiles(pkg.name, pkg.activeStage);
    const files: Record<string, string> = {};

    for (const entry of entries) {
      if (!isExportableEntry(entry)) {
        this.logger.debug(`Skipping ${entry.type} "${entry.name}" in package "${pkg.name}"`);
        continue;
      }

      const content = await this.client.fetchFile(pkg.name, pkg.activeStage, entry.name);
      files[entry.name] = content.toString('utf-8');
    }

    return { packageName: pkg.name, files };
  }
}

/**
 * Factory function to create an export engine
 */
export function createExportEngine(
  client: IConfigApiClient,
  writer: IBundleWriter,
  logger?: ExportLogger
): IExportEngine {
  return new ExportEngine(client, writer, logger);
}
