/**
 * Built-in templates, one per operation tool.
 *
 * Bodies run inside `run(context)` where `app`, `ui`, `design` and
 * `component` are already bound. Query tools and `execute_code` have no
 * template: they only make sense against a live document.
 */

import { EDGE_SELECTIONS, EXTRUDE_DIRECTIONS, FACE_SELECTIONS, FEATURE_OPERATIONS, PLANES } from '@cadlink/protocol';
import type { ScriptTemplate, SlotSpec } from './library.js';

const number: SlotSpec = { kind: 'number' };
const integer: SlotSpec = { kind: 'integer' };
const oneOf = (values: readonly string[]): SlotSpec => ({ kind: 'enum', values });

const point = (x: string, y: string, z: string) =>
  `adsk.core.Point3D.create({{${x}}} / 10, {{${y}}} / 10, {{${z}}} / 10)`;

export const BUILTIN_TEMPLATES: readonly ScriptTemplate[] = [
  {
    tool: 'create_sketch',
    preambles: ['construction_plane'],
    slots: { plane: oneOf(PLANES) },
    body: 'sketch = component.sketches.add(construction_plane(component, {{plane}}))',
  },
  {
    tool: 'draw_rectangle',
    preambles: ['active_sketch'],
    slots: { width: number, height: number, origin_x: number, origin_y: number, origin_z: number },
    body: [
      'sketch = active_sketch(component)',
      `corner = ${point('origin_x', 'origin_y', 'origin_z')}`,
      'opposite = adsk.core.Point3D.create(corner.x + {{width}} / 10, corner.y + {{height}} / 10, corner.z)',
      'sketch.sketchCurves.sketchLines.addTwoPointRectangle(corner, opposite)',
    ].join('\n'),
  },
  {
    tool: 'draw_circle',
    preambles: ['active_sketch'],
    slots: { radius: number, center_x: number, center_y: number, center_z: number },
    body: [
      'sketch = active_sketch(component)',
      `center = ${point('center_x', 'center_y', 'center_z')}`,
      'sketch.sketchCurves.sketchCircles.addByCenterRadius(center, {{radius}} / 10)',
    ].join('\n'),
  },
  {
    tool: 'draw_line',
    preambles: ['active_sketch'],
    slots: { start_x: number, start_y: number, start_z: number, end_x: number, end_y: number, end_z: number },
    body: [
      'sketch = active_sketch(component)',
      `start = ${point('start_x', 'start_y', 'start_z')}`,
      `end = ${point('end_x', 'end_y', 'end_z')}`,
      'sketch.sketchCurves.sketchLines.addByTwoPoints(start, end)',
    ].join('\n'),
  },
  {
    tool: 'extrude',
    preambles: ['active_sketch', 'sketch_profile', 'feature_operation', 'extrude_extent'],
    slots: {
      height: number,
      profile_index: integer,
      operation: oneOf(FEATURE_OPERATIONS),
      direction: oneOf(EXTRUDE_DIRECTIONS),
    },
    body: [
      'sketch = active_sketch(component)',
      'extrudes = component.features.extrudeFeatures',
      'extrude_input = extrudes.createInput(sketch_profile(sketch, {{profile_index}}), feature_operation({{operation}}))',
      'set_extrude_extent(extrude_input, {{height}} / 10, {{direction}})',
      'extrudes.add(extrude_input)',
    ].join('\n'),
  },
  {
    tool: 'revolve',
    preambles: ['active_sketch', 'sketch_profile', 'feature_operation'],
    slots: {
      angle: number,
      profile_index: integer,
      axis_origin_x: number,
      axis_origin_y: number,
      axis_origin_z: number,
      axis_direction_x: number,
      axis_direction_y: number,
      axis_direction_z: number,
      operation: oneOf(FEATURE_OPERATIONS),
    },
    body: [
      'sketch = active_sketch(component)',
      'profile = sketch_profile(sketch, {{profile_index}})',
      `axis_start = ${point('axis_origin_x', 'axis_origin_y', 'axis_origin_z')}`,
      'axis_end = adsk.core.Point3D.create(axis_start.x + {{axis_direction_x}}, axis_start.y + {{axis_direction_y}}, axis_start.z + {{axis_direction_z}})',
      'axis = sketch.sketchCurves.sketchLines.addByTwoPoints(axis_start, axis_end)',
      'axis.isConstruction = True',
      'revolves = component.features.revolveFeatures',
      'revolve_input = revolves.createInput(profile, axis, feature_operation({{operation}}))',
      'revolve_input.setAngleExtent(False, adsk.core.ValueInput.createByReal(math.radians({{angle}})))',
      'revolves.add(revolve_input)',
    ].join('\n'),
  },
  {
    tool: 'fillet',
    preambles: ['body_at', 'select_edges'],
    slots: { radius: number, body_index: integer, edge_selection: oneOf(EDGE_SELECTIONS) },
    body: [
      'body = body_at(component, {{body_index}})',
      'fillets = component.features.filletFeatures',
      'fillet_input = fillets.createInput()',
      'fillet_input.addConstantRadiusEdgeSet(select_edges(body, {{edge_selection}}), adsk.core.ValueInput.createByReal({{radius}} / 10), True)',
      'fillets.add(fillet_input)',
    ].join('\n'),
  },
  {
    tool: 'chamfer',
    preambles: ['body_at', 'select_edges'],
    slots: { distance: number, body_index: integer, edge_selection: oneOf(EDGE_SELECTIONS) },
    body: [
      'body = body_at(component, {{body_index}})',
      'chamfers = component.features.chamferFeatures',
      'chamfer_input = chamfers.createInput2()',
      'chamfer_input.chamferEdgeSets.addEqualDistanceChamferEdgeSet(select_edges(body, {{edge_selection}}), adsk.core.ValueInput.createByReal({{distance}} / 10), True)',
      'chamfers.add(chamfer_input)',
    ].join('\n'),
  },
  {
    tool: 'shell',
    preambles: ['body_at', 'select_faces'],
    slots: { thickness: number, body_index: integer, face_selection: oneOf(FACE_SELECTIONS) },
    body: [
      'body = body_at(component, {{body_index}})',
      'facesToRemove = select_faces(body, {{face_selection}})',
      'shells = component.features.shellFeatures',
      'shell_input = shells.createInput(facesToRemove, False)',
      'shell_input.insideThickness = adsk.core.ValueInput.createByReal({{thickness}} / 10)',
      'shells.add(shell_input)',
    ].join('\n'),
  },
  {
    tool: 'mirror',
    preambles: ['body_at', 'construction_plane'],
    slots: { mirror_plane: oneOf(PLANES), body_index: integer },
    body: [
      'bodies = adsk.core.ObjectCollection.create()',
      'bodies.add(body_at(component, {{body_index}}))',
      'mirrors = component.features.mirrorFeatures',
      'mirror_input = mirrors.createInput(bodies, construction_plane(component, {{mirror_plane}}))',
      'mirrors.add(mirror_input)',
    ].join('\n'),
  },
];
