/**
 * Handler table: one typed handler per catalog tool.
 *
 * A handler receives its parsed parameters and the active CadDocument and
 * returns a JSON-serialisable result, or throws. Parameters arrive already
 * validated against the catalog schema, so handlers read them as-is.
 */

import { isToolName, TOOL_NAMES, UnknownToolError } from '@cadlink/protocol';
import type { ToolName, ToolParams } from '@cadlink/protocol';
import type { CadDocument } from './document.js';

export type ToolHandler<N extends ToolName> = (params: ToolParams<N>, document: CadDocument) => unknown;

export type HandlerMap = { [N in ToolName]?: ToolHandler<N> };

export const BUILTIN_HANDLERS: { [N in ToolName]: ToolHandler<N> } = {
  get_scene_info: (_params, document) => document.sceneInfo(),
  get_object_info: (params, document) => document.objectInfo(params.name),
  execute_code: (params, document) => document.runCode(params.code),

  create_sketch: (params, document) => document.createSketch(params.plane),
  draw_rectangle: (p, document) =>
    document.drawRectangle([p.origin_x, p.origin_y, p.origin_z], p.width, p.height),
  draw_circle: (p, document) => document.drawCircle([p.center_x, p.center_y, p.center_z], p.radius),
  draw_line: (p, document) =>
    document.drawLine([p.start_x, p.start_y, p.start_z], [p.end_x, p.end_y, p.end_z]),

  extrude: (p, document) =>
    document.extrude({
      profileIndex: p.profile_index,
      distance: p.height,
      operation: p.operation,
      direction: p.direction,
    }),
  revolve: (p, document) =>
    document.revolve({
      profileIndex: p.profile_index,
      axisOrigin: [p.axis_origin_x, p.axis_origin_y, p.axis_origin_z],
      axisDirection: [p.axis_direction_x, p.axis_direction_y, p.axis_direction_z],
      angle: p.angle,
      operation: p.operation,
    }),
  fillet: (p, document) => document.fillet({ bodyIndex: p.body_index, size: p.radius, edges: p.edge_selection }),
  chamfer: (p, document) => document.chamfer({ bodyIndex: p.body_index, size: p.distance, edges: p.edge_selection }),
  shell: (p, document) => document.shell({ bodyIndex: p.body_index, thickness: p.thickness, face: p.face_selection }),
  mirror: (p, document) => document.mirror({ bodyIndex: p.body_index, plane: p.mirror_plane }),
};

export class HandlerTable {
  private readonly handlers: HandlerMap = {};

  /** Replaces any handler already registered for `name`. */
  register<N extends ToolName>(name: N, handler: ToolHandler<N>): this {
    if (!isToolName(name)) {
      throw new UnknownToolError(name, `Cannot register a handler for unknown tool "${String(name)}"`);
    }
    this.handlers[name] = handler;
    return this;
  }

  get<N extends ToolName>(name: N): ToolHandler<N> | undefined {
    return this.handlers[name];
  }

  has(name: string): boolean {
    return isToolName(name) && this.handlers[name] !== undefined;
  }

  tools(): ToolName[] {
    return TOOL_NAMES.filter((name) => this.handlers[name] !== undefined);
  }
}

function adopt<N extends ToolName>(table: HandlerTable, source: HandlerMap, name: N): void {
  const handler = source[name];
  if (handler) table.register(name, handler);
}

/**
 * Built-in handlers with `overrides` applied on top. Keys of `overrides`
 * must be catalog tools.
 */
export function createHandlerTable(overrides: HandlerMap = {}): HandlerTable {
  for (const key of Object.keys(overrides)) {
    if (!isToolName(key)) {
      throw new UnknownToolError(key, `Cannot register a handler for unknown tool "${key}"`);
    }
  }
  const table = new HandlerTable();
  for (const name of TOOL_NAMES) {
    adopt(table, BUILTIN_HANDLERS, name);
    adopt(table, overrides, name);
  }
  return table;
}
