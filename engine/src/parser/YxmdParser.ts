/**
 * Alteryx Workflow Parser
 *
 * Reads an Alteryx document (.yxmd, .yxmc, .yxwz) into the tool and
 * connection tables the graph is built from.
 *
 * Pipeline:
 * 1. Check the XML is well formed
 * 2. Parse it (attributes as `@_name`, all values as strings)
 * 3. Validate the document shape with zod
 * 4. Walk `<Node>` elements depth-first, tracking the enclosing container
 * 5. Read `<Connection>` elements
 *
 * @module parser
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { WorkflowParseError } from '../errors/WorkflowError.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { LogCategoryEnum } from '../types/log-types.js';
import { flattenConfiguration } from './ConfigurationFlattener.js';
import { describeZodIssues } from './SchemaIssues.js';
import {
  AlteryxDocumentSchema,
  NodeElementSchema,
  NodeListSchema,
  type ConnectionElement,
  type NodeElement,
} from './YxmdSchema.js';
import type { Connection, ToolId, ToolNode, ToolPosition, WorkflowTables } from '../types/graph-types.js';

export const UNKNOWN_TOOL_TYPE = 'Unknown';
export const MACRO_TOOL_TYPE = 'Macro';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  isArray: (tagName, jPath, _isLeafNode, isAttribute) => {
    if (isAttribute) return false;
    if (tagName === 'Node') {
      return jPath === 'AlteryxDocument.Nodes.Node' || jPath.endsWith('.ChildNodes.Node');
    }
    return tagName === 'Connection' && jPath === 'AlteryxDocument.Connections.Connection';
  },
});

export class YxmdParser {
  /**
   * Parse an Alteryx document.
   *
   * @param xml - Document text
   * @param source - File name used in error messages
   * @throws WorkflowParseError if the XML is malformed or not an Alteryx document
   */
  static parse(xml: string, source?: string): WorkflowTables {
    const logger = LoggerManager.for('YxmdParser', LogCategoryEnum.LOADING);

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new WorkflowParseError(`Malformed XML at line ${line}, column ${col}: ${msg}`, { source });
    }

    let document: z.infer<typeof AlteryxDocumentSchema>;
    try {
      document = AlteryxDocumentSchema.parse(xmlParser.parse(xml));
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new WorkflowParseError('Not an Alteryx workflow document', {
          source,
          structural: true,
          issues: describeZodIssues(error),
          cause: error,
        });
      }
      throw new WorkflowParseError(
        `Failed to parse workflow XML: ${error instanceof Error ? error.message : String(error)}`,
        { source, cause: error }
      );
    }

    const root = document.AlteryxDocument;
    const nodes: ToolNode[] = [];
    const connections: Connection[] = [];

    if (root !== '') {
      this.collectNodes(root.Nodes ?? '', undefined, 'Nodes', nodes, source);
      if (root.Connections !== undefined && root.Connections !== '') {
        for (const [index, element] of (root.Connections.Connection ?? []).entries()) {
          const connection = this.toConnection(element);
          if (connection) {
            connections.push(connection);
          } else {
            logger.warn('Skipping connection without both endpoints', { index, source });
          }
        }
      }
    }

    logger.debug('Parsed workflow document', {
      source,
      nodes: nodes.length,
      connections: connections.length,
    });

    return { nodes, connections };
  }

  /**
   * Depth-first over `<Node>` elements; children of `<ChildNodes>` get
   * the enclosing node as their container.
   */
  private static collectNodes(
    list: unknown,
    containerId: ToolId | undefined,
    path: string,
    out: ToolNode[],
    source: string | undefined
  ): void {
    const parsedList = NodeListSchema.safeParse(list);
    if (!parsedList.success) {
      throw new WorkflowParseError(`Invalid <${path.split('.').pop() ?? path}> element`, {
        source,
        structural: true,
        issues: describeZodIssues(parsedList.error).map((issue) => `${path}.${issue}`),
      });
    }
    if (parsedList.data === '') {
      return;
    }

    for (const [index, raw] of (parsedList.data.Node ?? []).entries()) {
      const parsed = NodeElementSchema.safeParse(raw);
      if (!parsed.success) {
        throw new WorkflowParseError('Invalid <Node> element', {
          source,
          structural: true,
          issues: describeZodIssues(parsed.error).map((issue) => `${path}.Node.${index}.${issue}`),
        });
      }

      const node = this.toToolNode(parsed.data, containerId);
      out.push(node);

      if (parsed.data.ChildNodes !== undefined) {
        this.collectNodes(parsed.data.ChildNodes, node.id, `${path}.Node.${index}.ChildNodes`, out, source);
      }
    }
  }

  private static toToolNode(element: NodeElement, containerId: ToolId | undefined): ToolNode {
    const gui = element.GuiSettings === '' ? undefined : element.GuiSettings;
    const properties = element.Properties === '' ? undefined : element.Properties;
    const engine = element.EngineSettings === '' ? undefined : element.EngineSettings;

    const plugin = gui?.['@_Plugin'];
    const annotation =
      properties?.Annotation !== undefined && properties.Annotation !== ''
        ? properties.Annotation.DefaultAnnotationText
        : undefined;
    const position = gui?.Position !== undefined && gui.Position !== '' ? readPosition(gui.Position) : undefined;

    return {
      id: element['@_ToolID'],
      type: this.toolType(plugin, engine?.['@_Macro']),
      configuration: flattenConfiguration(properties?.Configuration),
      ...(containerId !== undefined && { containerId }),
      ...(plugin !== undefined && { plugin }),
      ...(annotation !== undefined && annotation !== '' && { annotation }),
      ...(position !== undefined && { position }),
    };
  }

  /**
   * `AlteryxBasePluginsGui.Filter.Filter` → `Filter`. Macros carry no
   * plugin, only the macro path.
   */
  static toolType(plugin: string | undefined, macro: string | undefined): string {
    if (plugin !== undefined && plugin.trim() !== '') {
      const segments = plugin.trim().split('.');
      const last = segments[segments.length - 1].replace(/\(\)$/, '');
      return last === '' ? UNKNOWN_TOOL_TYPE : last;
    }
    if (macro !== undefined && macro.trim() !== '') {
      return MACRO_TOOL_TYPE;
    }
    return UNKNOWN_TOOL_TYPE;
  }

  private static toConnection(element: ConnectionElement): Connection | undefined {
    const origin = element.Origin === '' ? undefined : element.Origin;
    const destination = element.Destination === '' ? undefined : element.Destination;
    const sourceId = origin?.['@_ToolID']?.trim();
    const targetId = destination?.['@_ToolID']?.trim();

    if (!sourceId || !targetId) {
      return undefined;
    }

    const sourceOutputPort = origin?.['@_Connection'];
    const targetInputPort = destination?.['@_Connection'];

    return {
      sourceId,
      targetId,
      ...(sourceOutputPort !== undefined && { sourceOutputPort }),
      ...(targetInputPort !== undefined && { targetInputPort }),
      ...(element['@_Wireless'] === 'True' && { wireless: true }),
    };
  }
}

function readPosition(position: { '@_x'?: string; '@_y'?: string }): ToolPosition | undefined {
  const x = Number(position['@_x']);
  const y = Number(position['@_y']);
  if (position['@_x'] === undefined || position['@_y'] === undefined || !Number.isFinite(x) || !Number.isFinite(y)) {
    return undefined;
  }
  return { x, y };
}
