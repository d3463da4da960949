import * as fs from 'node:fs';

import { FileAccessError, JsonParseError, errorMessage, logger } from '../utils';
import type { JsonValue } from './types';

export type ReadFileFn = (filePath: string, encoding: 'utf8') => string;

export const defaultReadFile: ReadFileFn = (filePath, encoding) =>
  fs.readFileSync(filePath, encoding);

function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Read a file fully and parse it as JSON.
 *
 * @throws FileAccessError when the file cannot be read
 * @throws JsonParseError when the contents are not JSON
 */
export function loadJsonDocument(
  filePath: string,
  readFile: ReadFileFn = defaultReadFile
): JsonValue {
  let text: string;
  try {
    text = readFile(filePath, 'utf8');
  } catch (error) {
    const code = systemErrorCode(error);
    const reason =
      code === 'ENOENT'
        ? 'file not found'
        : code === 'EACCES'
          ? 'permission denied'
          : code === 'EISDIR'
            ? 'is a directory'
            : errorMessage(error);
    throw new FileAccessError(filePath, reason, code);
  }

  // Editors on Windows like to prepend a BOM; JSON.parse rejects it.
  if (text.charCodeAt(0) === 0xfeff) {
    text = text.slice(1);
  }

  try {
    const document: JsonValue = JSON.parse(text);
    logger.debug(`Loaded ${filePath}`, { bytes: text.length });
    return document;
  } catch (error) {
    throw new JsonParseError(filePath, errorMessage(error));
  }
}
