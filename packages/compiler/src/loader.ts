/**
 * Calibration Loader
 *
 * Reads YAML sources into ordered maps. Keys keep their declaration order
 * and their YAML type, so a numeric frame key is caught by validation
 * rather than silently stringified. `<<` merge keys are resolved, so frames
 * may share offsets through an anchor.
 *
 * @module compiler/loader
 */

import { readFileSync } from 'fs';
import { parse, YAMLParseError } from 'yaml';

import { FormatError, NotFoundError, ParseError } from './errors';
import type { Mapping } from './mapping';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read a text source, mapping a missing file to NotFoundError
 */
export function readSource(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      throw new NotFoundError(path);
    }
    throw error;
  }
}

/**
 * Load a calibration source and check that it holds a non-empty mapping.
 */
export function loadCalibrationSource(path: string): Mapping {
  const text = readSource(path);

  let content: unknown;
  try {
    content = parse(text, { mapAsMap: true, merge: true });
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ParseError(path, error.message);
    }
    throw error;
  }

  if (content === null || content === undefined) {
    throw new FormatError(path, 'file is empty');
  }
  if (!(content instanceof Map)) {
    throw new FormatError(path, 'file must contain a mapping');
  }
  if (content.size === 0) {
    throw new FormatError(path, 'mapping is empty');
  }
  return content;
}
