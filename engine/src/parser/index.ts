/**
 * Workflow Parsers
 *
 * - YxmdParser: Alteryx XML documents
 * - TableParser: JSON/YAML tool and connection tables
 *
 * @module parser
 */

export * from './ConfigurationFlattener.js';
export * from './SchemaIssues.js';
export * from './TableParser.js';
export * from './YxmdParser.js';
