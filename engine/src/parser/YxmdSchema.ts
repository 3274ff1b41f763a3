/**
 * Shapes of the parts of an Alteryx document the parser reads.
 *
 * The XML is parsed with attributes prefixed `@_` and every value kept as
 * a string. Empty elements (`<Nodes/>`) parse to `''`, so each optional
 * element accepts that too. Unknown children pass through untouched.
 *
 * @module parser
 */

import { z } from 'zod';

const emptyElement = z.literal('');

function element<T extends z.ZodTypeAny>(schema: T) {
  return z.union([emptyElement, schema]).optional();
}

export const PositionSchema = z
  .object({
    '@_x': z.string().optional(),
    '@_y': z.string().optional(),
  })
  .passthrough();

export const GuiSettingsSchema = z
  .object({
    '@_Plugin': z.string().optional(),
    Position: element(PositionSchema),
  })
  .passthrough();

export const AnnotationSchema = z
  .object({
    DefaultAnnotationText: z.string().optional(),
  })
  .passthrough();

export const PropertiesSchema = z
  .object({
    Configuration: z.unknown().optional(),
    Annotation: element(AnnotationSchema),
  })
  .passthrough();

export const EngineSettingsSchema = z
  .object({
    '@_Macro': z.string().optional(),
  })
  .passthrough();

/**
 * A single `<Node>`; `ChildNodes` is validated one level at a time
 */
export const NodeElementSchema = z
  .object({
    '@_ToolID': z.string().trim().min(1, 'ToolID must not be empty'),
    GuiSettings: element(GuiSettingsSchema),
    Properties: element(PropertiesSchema),
    EngineSettings: element(EngineSettingsSchema),
    ChildNodes: z.unknown().optional(),
  })
  .passthrough();

export const NodeListSchema = z.union([
  emptyElement,
  z.object({ Node: z.array(z.unknown()).optional() }).passthrough(),
]);

export const EndpointSchema = z
  .object({
    '@_ToolID': z.string().optional(),
    '@_Connection': z.string().optional(),
  })
  .passthrough();

export const ConnectionElementSchema = z
  .object({
    '@_Wireless': z.string().optional(),
    Origin: element(EndpointSchema),
    Destination: element(EndpointSchema),
  })
  .passthrough();

export const ConnectionListSchema = z.union([
  emptyElement,
  z.object({ Connection: z.array(ConnectionElementSchema).optional() }).passthrough(),
]);

export const AlteryxDocumentSchema = z
  .object({
    AlteryxDocument: z.union([
      emptyElement,
      z
        .object({
          Nodes: NodeListSchema.optional(),
          Connections: ConnectionListSchema.optional(),
        })
        .passthrough(),
    ]),
  })
  .passthrough();

export type NodeElement = z.infer<typeof NodeElementSchema>;
export type ConnectionElement = z.infer<typeof ConnectionElementSchema>;
