/**
 * Loads export defaults from a YAML config file
 *
 * Example:
 *   host: icinga-master.example.com
 *   port: "5665"
 *   ca: /etc/icinga2/pki/ca.crt
 *   cn: icinga-master
 *   user: export
 *   output: ./exported
 *   skipInternal: true
 */

import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '../../core/errors';
import { RawExportOptions } from '../../core/validators/ConfigValidator';

const STRING_KEYS = ['host', 'port', 'ca', 'cn', 'user', 'output'] as const;
const BOOLEAN_KEYS = ['skipInternal', 'escapeFilePaths'] as const;

export async function loadConfigFile(configPath: string): Promise<RawExportOptions> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${configPath}: ${errorMessage(error)}`);
  }

  // An empty file is an empty config
  if (document === undefined || document === null) {
    return {};
  }

  return parseConfigDocument(document, configPath);
}

export function parseConfigDocument(document: unknown, source: string): RawExportOptions {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new ConfigurationError(`Config file ${source} must contain a mapping`);
  }

  const entries = new Map(Object.entries(document));
  const options: RawExportOptions = {};

  for (const key of STRING_KEYS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    // YAML reads an unquoted port as a number
    if (typeof value === 'number' && key === 'port') {
      options.port = String(value);
    } else if (typeof value === 'string') {
      options[key] = value;
    } else {
      throw new ConfigurationError(`${source}: "${key}" must be a string`);
    }
  }

  for (const key of BOOLEAN_KEYS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new ConfigurationError(`${source}: "${key}" must be true or false`);
    }
    options[key] = value;
  }

  return options;
}
