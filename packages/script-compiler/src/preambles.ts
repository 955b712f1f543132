/**
 * Preambles: Python helper definitions shared by template bodies.
 *
 * A compiled script defines each helper once, before `run`, in the order
 * the helpers are first needed.
 */

const lines = (...body: string[]): string => body.join('\n');

export const PREAMBLES = {
  active_sketch: lines(
    'def active_sketch(component):',
    '    if component.sketches.count == 0:',
    "        raise RuntimeError('No sketch available. Create a sketch first.')",
    '    return component.sketches.item(component.sketches.count - 1)',
  ),
  construction_plane: lines(
    'def construction_plane(component, name):',
    '    planes = {',
    "        'xy': component.xYConstructionPlane,",
    "        'yz': component.yZConstructionPlane,",
    "        'xz': component.xZConstructionPlane,",
    '    }',
    '    return planes[name]',
  ),
  sketch_profile: lines(
    'def sketch_profile(sketch, index):',
    '    if sketch.profiles.count == 0:',
    "        raise RuntimeError('No closed profiles in the active sketch.')",
    '    if index >= sketch.profiles.count:',
    "        raise RuntimeError('Profile index {} out of range ({} profiles).'.format(index, sketch.profiles.count))",
    '    return sketch.profiles.item(index)',
  ),
  feature_operation: lines(
    'def feature_operation(name):',
    '    operations = {',
    "        'new_body': adsk.fusion.FeatureOperations.NewBodyFeatureOperation,",
    "        'join': adsk.fusion.FeatureOperations.JoinFeatureOperation,",
    "        'cut': adsk.fusion.FeatureOperations.CutFeatureOperation,",
    "        'intersect': adsk.fusion.FeatureOperations.IntersectFeatureOperation,",
    '    }',
    '    return operations[name]',
  ),
  extrude_extent: lines(
    'def set_extrude_extent(extrude_input, distance, direction):',
    "    if direction == 'symmetric':",
    '        extrude_input.setSymmetricExtent(adsk.core.ValueInput.createByReal(distance), True)',
    '        return',
    "    signed = -distance if direction == 'negative' else distance",
    '    extrude_input.setDistanceExtent(False, adsk.core.ValueInput.createByReal(signed))',
  ),
  body_at: lines(
    'def body_at(component, index):',
    '    if component.bRepBodies.count == 0:',
    "        raise RuntimeError('No bodies available.')",
    '    if index >= component.bRepBodies.count:',
    "        raise RuntimeError('Body index {} out of range ({} bodies).'.format(index, component.bRepBodies.count))",
    '    return component.bRepBodies.item(index)',
  ),
  select_edges: lines(
    'def select_edges(body, selection):',
    '    box = body.boundingBox',
    '    tolerance = 0.001',
    '    rules = {',
    "        'all': lambda edge: True,",
    "        'top': lambda edge: abs(edge.pointOnEdge.z - box.maxPoint.z) < tolerance,",
    "        'bottom': lambda edge: abs(edge.pointOnEdge.z - box.minPoint.z) < tolerance,",
    "        'vertical': lambda edge: abs(edge.startVertex.geometry.z - edge.endVertex.geometry.z) > tolerance,",
    '    }',
    '    edges = adsk.core.ObjectCollection.create()',
    '    for edge in body.edges:',
    '        if rules[selection](edge):',
    '            edges.add(edge)',
    '    if edges.count == 0:',
    "        raise RuntimeError('No {} edges found on {}.'.format(selection, body.name))",
    '    return edges',
  ),
  select_faces: lines(
    'def select_faces(body, side):',
    '    box = body.boundingBox',
    '    tolerance = 0.001',
    '    rules = {',
    "        'top': lambda p: abs(p.z - box.maxPoint.z) < tolerance,",
    "        'bottom': lambda p: abs(p.z - box.minPoint.z) < tolerance,",
    "        'front': lambda p: abs(p.y - box.minPoint.y) < tolerance,",
    "        'back': lambda p: abs(p.y - box.maxPoint.y) < tolerance,",
    "        'right': lambda p: abs(p.x - box.maxPoint.x) < tolerance,",
    "        'left': lambda p: abs(p.x - box.minPoint.x) < tolerance,",
    '    }',
    '    faces = adsk.core.ObjectCollection.create()',
    '    for face in body.faces:',
    '        if rules[side](face.pointOnFace):',
    '            faces.add(face)',
    '    if faces.count == 0:',
    "        raise RuntimeError('No {} face found on {}.'.format(side, body.name))",
    '    return faces',
  ),
} as const;

export type PreambleId = keyof typeof PREAMBLES;

export function isPreambleId(id: string): id is PreambleId {
  return Object.prototype.hasOwnProperty.call(PREAMBLES, id);
}
