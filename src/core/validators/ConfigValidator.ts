/**
 * Turns raw command-line, config-file and environment values into
 * a frozen ExportConfig
 */

import { ConfigurationError } from '../errors';
import { ConnectionConfig, ExportConfig } from '../engine/interfaces';

export const DEFAULT_PORT = '5665';
export const PASSWORD_ENV_VAR = 'I2_PASS';

/**
 * Option values as they arrive from commander or a config file
 */
export interface RawExportOptions {
  host?: string;
  port?: string;
  ca?: string;
  cn?: string;
  user?: string;
  output?: string;
  skipInternal?: boolean;
  escapeFilePaths?: boolean;
}

type RequiredFlag = 'host' | 'port' | 'ca' | 'cn' | 'user';

// Checked in this order, so the first missing flag is the one reported
const REQUIRED_FLAGS: RequiredFlag[] = ['host', 'port', 'ca', 'cn', 'user'];

export class ConfigValidator {
  /**
   * Validate options and environment, throwing ConfigurationError
   * on the first missing value
   */
  validate(options: RawExportOptions, env: NodeJS.ProcessEnv): ExportConfig {
    const values: Record<RequiredFlag, string> = {
      host: options.host ?? '',
      port: options.port ?? DEFAULT_PORT,
      ca: options.ca ?? '',
      cn: options.cn ?? '',
      user: options.user ?? '',
    };

    for (const flag of REQUIRED_FLAGS) {
      if (values[flag] === '') {
        throw new ConfigurationError(`-${flag} missing`);
      }
    }

    const password = env[PASSWORD_ENV_VAR] ?? '';
    if (password === '') {
      throw new ConfigurationError(`$${PASSWORD_ENV_VAR} missing`);
    }

    const connection: ConnectionConfig = Object.freeze({
      host: values.host,
      port: values.port,
      caFile: values.ca,
      commonName: values.cn,
      username: values.user,
      password,
    });

    return Object.freeze({
      connection,
      outputDir: options.output || '.',
      skipInternalPackages: options.skipInternal ?? false,
      escapeFilePaths: options.escapeFilePaths ?? false,
    });
  }

  /**
   * Merge config-file values with command-line values; the latter win
   */
  merge(fromFile: RawExportOptions, fromCli: RawExportOptions): RawExportOptions {
    return {
      host: fromCli.host ?? fromFile.host,
      port: fromCli.port ?? fromFile.port,
      ca: fromCli.ca ?? fromFile.ca,
      cn: fromCli.cn ?? fromFile.cn,
      user: fromCli.user ?? fromFile.user,
      output: fromCli.output ?? fromFile.output,
      skipInternal: fromCli.skipInternal ?? fromFile.skipInternal,
      escapeFilePaths: fromCli.escapeFilePaths ?? fromFile.escapeFilePaths,
    };
  }
}

/**
 * Factory function to create a config validator
 */
export function createConfigValidator(): ConfigValidator {
  return new ConfigValidator();
}
