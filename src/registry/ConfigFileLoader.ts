/**
 * Configuration File Loader
 *
 * Reads one server configuration file and extracts a ServerConfiguration
 * from the first map node the parser produces.
 */

import { promises as fsp } from 'fs';
import type { ParsedDocument, StructuredFileParser } from '../types/index.js';
import {
  FileUnreadableError,
  InvalidConfigurationError,
  ParseFailureError,
  toError
} from '../utils/errors.js';
import { ServerConfiguration } from './ServerConfiguration.js';
import { YamlFileParser } from './YamlFileParser.js';

export type LoadResult =
  | { ok: true; configuration: ServerConfiguration }
  | { ok: false; error: FileUnreadableError | ParseFailureError };

/** errno codes meaning the file itself could not be read */
const FILE_ACCESS_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR']);

function isFileAccessError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && FILE_ACCESS_CODES.has(err.code);
}

export class ConfigFileLoader {
  constructor(private readonly parser: StructuredFileParser = new YamlFileParser()) {}

  async loadFromFile(filePath: string): Promise<LoadResult> {
    try {
      const handle = await fsp.open(filePath, 'r');
      await handle.close();
    } catch (err) {
      const error = new FileUnreadableError(filePath, toError(err));
      console.error(`[ConfigFileLoader] ${error.message}`);
      return { ok: false, error };
    }

    let document: ParsedDocument;
    try {
      document = await this.parser.parse(filePath);
    } catch (err) {
      // The file can vanish or lose permissions between the check and the read
      const error = isFileAccessError(err)
        ? new FileUnreadableError(filePath, err)
        : new ParseFailureError(filePath, toError(err).message);
      console.error(`[ConfigFileLoader] ${error.message}`);
      return { ok: false, error };
    }

    const parserErrors = document.errors();
    if (parserErrors.length > 0) {
      console.error(`[ConfigFileLoader] Parser reported errors in ${filePath}:\n${parserErrors.join('\n')}`);
    }

    const [node] = document.findData('map');
    if (!node) {
      return {
        ok: false,
        error: new ParseFailureError(filePath, 'no server configuration found', parserErrors)
      };
    }

    try {
      return { ok: true, configuration: ServerConfiguration.fromNode(node) };
    } catch (err) {
      const reason = err instanceof InvalidConfigurationError ? err.issues.join('; ') : toError(err).message;
      return { ok: false, error: new ParseFailureError(filePath, reason, parserErrors) };
    }
  }
}
