/**
 * Workflow Loader
 *
 * ARCHITECTURAL ROLE:
 * ===================
 * This is a UTILITY layer, NOT part of the graph core.
 *
 * Responsibilities:
 * - File I/O (reading workflow files from disk)
 * - Picking the parser from the file extension
 * - Returning the tool and connection tables
 *
 * Does NOT:
 * - Build or order the graph (that's GraphBuilder / TopologicalSorter)
 * - Know about the CLI
 *
 * Example:
 * ```ts
 * const tables = await WorkflowLoader.fromFile('./sales.yxmd');
 * const graph = GraphBuilder.fromTables(tables);
 * ```
 *
 * @module loader
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { extname, resolve } from 'path';
import { WorkflowLoadError } from '../errors/WorkflowError.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { TableParser } from '../parser/TableParser.js';
import { YxmdParser } from '../parser/YxmdParser.js';
import { LogCategoryEnum } from '../types/log-types.js';
import type { WorkflowTables } from '../types/graph-types.js';

/**
 * How a workflow document is encoded
 */
export type WorkflowFormat = 'yxmd' | 'json' | 'yaml';

const FORMAT_BY_EXTENSION: Readonly<Record<string, WorkflowFormat>> = {
  '.yxmd': 'yxmd',
  '.yxmc': 'yxmd',
  '.yxwz': 'yxmd',
  '.xml': 'yxmd',
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

export class WorkflowLoader {
  /**
   * Load workflow tables from a file
   *
   * PIPELINE:
   * 1. Detect format from the extension
   * 2. Validate file exists
   * 3. Read file content
   * 4. Parse with the matching parser
   *
   * @throws WorkflowLoadError if the format is unknown or the file can't be read
   * @throws WorkflowParseError if the content is invalid
   */
  static async fromFile(filePath: string): Promise<WorkflowTables> {
    const logger = LoggerManager.for('WorkflowLoader', LogCategoryEnum.LOADING);

    // Step 1: Format
    const format = this.detectFormat(filePath);
    if (!format) {
      throw WorkflowLoadError.unsupportedFormat(filePath, extname(filePath).toLowerCase(), this.supportedExtensions());
    }

    // Step 2: Validate file exists
    const resolvedPath = resolve(filePath);
    if (!existsSync(resolvedPath)) {
      throw WorkflowLoadError.fileNotFound(filePath);
    }

    // Step 3: Read file content
    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw WorkflowLoadError.readFailed(filePath, error);
    }

    logger.debug('Loaded workflow file', { path: resolvedPath, format, bytes: content.length });

    // Step 4: Parse
    return this.fromString(content, format, filePath);
  }

  /**
   * Parse workflow content that is already in memory
   */
  static fromString(content: string, format: WorkflowFormat, source?: string): WorkflowTables {
    switch (format) {
      case 'yxmd':
        return YxmdParser.parse(stripByteOrderMark(content), source);
      case 'json':
        return TableParser.fromJSON(stripByteOrderMark(content), source);
      case 'yaml':
        return TableParser.fromYAML(content, source);
    }
  }

  /**
   * Format for a file name, or undefined when the extension is unknown
   */
  static detectFormat(filePath: string): WorkflowFormat | undefined {
    return FORMAT_BY_EXTENSION[extname(filePath).toLowerCase()];
  }

  /**
   * Extensions `fromFile` accepts, lower case with the leading dot
   */
  static supportedExtensions(): string[] {
    return Object.keys(FORMAT_BY_EXTENSION);
  }
}

// Alteryx Designer saves documents with a UTF-8 BOM
function stripByteOrderMark(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}
