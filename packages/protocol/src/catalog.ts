/**
 * Tool Catalog: the names and parameter schemas of every Fusion 360 tool.
 *
 * Shared by the MCP server (tool registration, validation before compile or
 * send) and the executor (validation before a handler runs).
 */

import { z } from 'zod';

export const PLANES = ['xy', 'yz', 'xz'] as const;
export const FEATURE_OPERATIONS = ['new_body', 'join', 'cut', 'intersect'] as const;
export const EXTRUDE_DIRECTIONS = ['positive', 'negative', 'symmetric'] as const;
export const EDGE_SELECTIONS = ['all', 'top', 'bottom', 'vertical'] as const;
export const FACE_SELECTIONS = ['top', 'bottom', 'front', 'back', 'left', 'right'] as const;

export type PlaneName = (typeof PLANES)[number];
export type FeatureOperation = (typeof FEATURE_OPERATIONS)[number];
export type ExtrudeDirection = (typeof EXTRUDE_DIRECTIONS)[number];
export type EdgeSelection = (typeof EDGE_SELECTIONS)[number];
export type FaceSelection = (typeof FACE_SELECTIONS)[number];

const length = (what: string) => z.number().finite().min(0.1).describe(`${what} in mm`);
const coordinate = (what: string) => z.number().finite().default(0).describe(what);
const index = (what: string) => z.number().int().min(0).default(0).describe(`Index of the ${what} (0-based)`);

export const TOOL_SHAPES = {
  get_scene_info: {},
  get_object_info: {
    name: z.string().min(1).describe('Name of the body or sketch to inspect'),
  },
  execute_code: {
    code: z.string().min(1).describe('Python code to execute inside Fusion 360'),
  },
  create_sketch: {
    plane: z.enum(PLANES).describe('Construction plane to sketch on'),
  },
  draw_rectangle: {
    width: length('Width of the rectangle'),
    height: length('Height of the rectangle'),
    origin_x: coordinate('X coordinate of the first corner'),
    origin_y: coordinate('Y coordinate of the first corner'),
    origin_z: coordinate('Z coordinate of the first corner'),
  },
  draw_circle: {
    radius: length('Radius of the circle'),
    center_x: coordinate('X coordinate of the center'),
    center_y: coordinate('Y coordinate of the center'),
    center_z: coordinate('Z coordinate of the center'),
  },
  draw_line: {
    start_x: z.number().finite().describe('X coordinate of the start point'),
    start_y: z.number().finite().describe('Y coordinate of the start point'),
    start_z: coordinate('Z coordinate of the start point'),
    end_x: z.number().finite().describe('X coordinate of the end point'),
    end_y: z.number().finite().describe('Y coordinate of the end point'),
    end_z: coordinate('Z coordinate of the end point'),
  },
  extrude: {
    height: length('Extrusion height'),
    profile_index: index('sketch profile to extrude'),
    operation: z.enum(FEATURE_OPERATIONS).default('new_body').describe('Feature operation'),
    direction: z.enum(EXTRUDE_DIRECTIONS).default('positive').describe('Extrusion direction'),
  },
  revolve: {
    angle: z.number().finite().min(0.1).max(360).describe('Angle of revolution in degrees'),
    profile_index: index('sketch profile to revolve'),
    axis_origin_x: coordinate('X coordinate of the axis origin'),
    axis_origin_y: coordinate('Y coordinate of the axis origin'),
    axis_origin_z: coordinate('Z coordinate of the axis origin'),
    axis_direction_x: z.number().finite().default(1).describe('X component of the axis direction'),
    axis_direction_y: coordinate('Y component of the axis direction'),
    axis_direction_z: coordinate('Z component of the axis direction'),
    operation: z.enum(FEATURE_OPERATIONS).default('new_body').describe('Feature operation'),
  },
  fillet: {
    radius: length('Fillet radius'),
    body_index: index('body to fillet'),
    edge_selection: z.enum(EDGE_SELECTIONS).default('all').describe('Which edges to fillet'),
  },
  chamfer: {
    distance: length('Chamfer distance'),
    body_index: index('body to chamfer'),
    edge_selection: z.enum(EDGE_SELECTIONS).default('all').describe('Which edges to chamfer'),
  },
  shell: {
    thickness: length('Wall thickness'),
    body_index: index('body to shell'),
    face_selection: z.enum(FACE_SELECTIONS).default('top').describe('Which face to remove'),
  },
  mirror: {
    mirror_plane: z.enum(PLANES).describe('Plane to mirror across'),
    body_index: index('body to mirror'),
  },
} satisfies Record<string, z.ZodRawShape>;

export type ToolName = keyof typeof TOOL_SHAPES;
export type ToolSchema<N extends ToolName> = z.ZodObject<(typeof TOOL_SHAPES)[N], 'strict'>;
/** Parsed parameters of one tool, schema defaults applied. */
export type ToolParams<N extends ToolName> = z.objectOutputType<(typeof TOOL_SHAPES)[N], z.ZodTypeAny, 'strict'>;

export type ToolCategory = 'query' | 'code' | 'sketch' | 'feature';

export interface ToolInfo {
  title: string;
  description: string;
  category: ToolCategory;
}

export const TOOL_INFO: Record<ToolName, ToolInfo> = {
  get_scene_info: {
    title: 'Get Scene Info',
    description: 'Get detailed information about the current Fusion 360 design',
    category: 'query',
  },
  get_object_info: {
    title: 'Get Object Info',
    description: 'Get detailed information about a body or sketch in the design',
    category: 'query',
  },
  execute_code: {
    title: 'Execute Fusion 360 Code',
    description: 'Execute arbitrary Python code inside Fusion 360 for debugging and advanced operations',
    category: 'code',
  },
  create_sketch: {
    title: 'Create Sketch',
    description: 'Create a new sketch on a construction plane',
    category: 'sketch',
  },
  draw_rectangle: {
    title: 'Draw Rectangle',
    description: 'Draw a two-point rectangle in the active sketch',
    category: 'sketch',
  },
  draw_circle: {
    title: 'Draw Circle',
    description: 'Draw a circle in the active sketch',
    category: 'sketch',
  },
  draw_line: {
    title: 'Draw Line',
    description: 'Draw a line in the active sketch',
    category: 'sketch',
  },
  extrude: {
    title: 'Extrude',
    description: 'Extrude a profile of the active sketch',
    category: 'feature',
  },
  revolve: {
    title: 'Revolve',
    description: 'Revolve a profile of the active sketch around an axis',
    category: 'feature',
  },
  fillet: {
    title: 'Fillet Edges',
    description: 'Round the selected edges of a body',
    category: 'feature',
  },
  chamfer: {
    title: 'Chamfer Edges',
    description: 'Bevel the selected edges of a body',
    category: 'feature',
  },
  shell: {
    title: 'Shell Body',
    description: 'Hollow out a body, removing one face',
    category: 'feature',
  },
  mirror: {
    title: 'Mirror Body',
    description: 'Mirror a body across a construction plane',
    category: 'feature',
  },
};

export const TOOL_NAMES = Object.keys(TOOL_SHAPES).filter(isToolName);

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_SHAPES, name);
}

/** Strict object schema for one tool; unknown parameters are rejected. */
export function toolSchema<N extends ToolName>(name: N): ToolSchema<N> {
  return z.object(TOOL_SHAPES[name]).strict();
}

export interface ParameterSummary {
  name: string;
  required: boolean;
  description?: string;
}

export interface ToolSummary extends ToolInfo {
  name: ToolName;
  parameters: ParameterSummary[];
}

/** Catalog overview for resources and diagnostics. */
export function listTools(): ToolSummary[] {
  return TOOL_NAMES.map((name) => {
    const shape: z.ZodRawShape = TOOL_SHAPES[name];
    const parameters = Object.entries(shape).map(([param, schema]) => ({
      name: param,
      required: !schema.isOptional(),
      description: schema.description,
    }));
    return { name, ...TOOL_INFO[name], parameters };
  });
}
