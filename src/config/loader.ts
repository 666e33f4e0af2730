/**
 * Reads the YAML configuration document from disk.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { parseDocument, type DocumentConfig } from './document.js';
import { ValidationError, errorMessage } from '../utils/errors.js';

export interface LoadedDocument {
  document: DocumentConfig;
  /** Absolute path of the file that was read */
  path: string;
  /** Directory relative extension specifiers resolve against */
  baseDir: string;
}

/**
 * Load and validate a configuration document
 * @param configPath - Path to the YAML (or JSON) file
 * @param cwd - Directory a relative configPath resolves against
 */
export async function loadDocument(configPath: string, cwd = process.cwd()): Promise<LoadedDocument> {
  const absPath = path.resolve(cwd, configPath);

  let text: string;
  try {
    text = await readFile(absPath, 'utf8');
  } catch (error) {
    throw new Error(`Config file not found or unreadable: "${absPath}" (${errorMessage(error)})`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ValidationError(`Config file "${absPath}" is not valid YAML`, errorMessage(error));
  }

  return {
    document: parseDocument(raw),
    path: absPath,
    baseDir: path.dirname(absPath),
  };
}
