/**
 * Writes export bundles as <escaped package name>.json files
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { ExportBundle, IBundleWriter } from '../core/engine/interfaces';
import { BundleWriteError, errorMessage } from '../core/errors';
import { bundleFileName } from '../core/paths';

// Orders keys by their UTF-8 bytes, not by UTF-16 code units
function compareUtf8(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Serialize a bundle as {"files": {...}} with sorted keys and a trailing newline
 */
export function serializeBundle(bundle: ExportBundle): string {
  const files: Record<string, string> = {};
  for (const name of Object.keys(bundle.files).sort(compareUtf8)) {
    files[name] = bundle.files[name];
  }

  return `${JSON.stringify({ files })}\n`;
}

export class FileBundleWriter implements IBundleWriter {
  constructor(private readonly outputDir: string = '.') {}

  async write(bundle: ExportBundle): Promise<string> {
    const filepath = path.join(this.outputDir, bundleFileName(bundle.packageName));

    try {
      await fs.mkdir(this.outputDir, { recursive: true });
      // Truncates an existing bundle from an earlier run
      await fs.writeFile(filepath, serializeBundle(bundle), { flag: 'w' });
    } catch (error) {
      throw new BundleWriteError(`Cannot write ${filepath}: ${errorMessage(error)}`);
    }

    return filepath;
  }
}
