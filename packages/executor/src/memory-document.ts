/**
 * In-memory CadDocument for headless runs and tests.
 *
 * Keeps the bookkeeping a real design would expose to the handlers
 * (sketches, profiles, bodies with tagged edges and faces, a feature
 * timeline) without computing geometry. Closed curves count as profiles;
 * lines do not.
 */

import type { EdgeSelection, FaceSelection, PlaneName } from '@cadlink/protocol';
import { DocumentError } from './document.js';
import type {
  BodySummary,
  CadDocument,
  CurveResult,
  DocumentHost,
  EdgeFeatureOptions,
  ExtrudeOptions,
  FeatureResult,
  FeatureType,
  MirrorOptions,
  ObjectInfo,
  Point3,
  RevolveOptions,
  SceneInfo,
  ShellOptions,
  SketchResult,
  SketchSummary,
} from './document.js';

type Curve =
  | { kind: 'rectangle'; corner: Point3; width: number; height: number }
  | { kind: 'circle'; center: Point3; radius: number }
  | { kind: 'line'; start: Point3; end: Point3 };

type EdgeTag = Exclude<EdgeSelection, 'all'> | 'other';
type FaceTag = FaceSelection | 'side' | 'blend';

interface Sketch {
  name: string;
  plane: PlaneName;
  curves: Curve[];
}

interface Body {
  name: string;
  edges: EdgeTag[];
  faces: FaceTag[];
}

interface Feature {
  name: string;
  type: FeatureType;
  bodies: string[];
}

const PRISM_EDGES: EdgeTag[] = ['top', 'top', 'top', 'top', 'bottom', 'bottom', 'bottom', 'bottom', 'vertical', 'vertical', 'vertical', 'vertical'];
const PRISM_FACES: FaceTag[] = ['top', 'bottom', 'front', 'back', 'left', 'right'];
const CYLINDER_EDGES: EdgeTag[] = ['top', 'bottom'];
const CYLINDER_FACES: FaceTag[] = ['top', 'bottom', 'side'];

const TITLES: Record<FeatureType, string> = {
  extrude: 'Extrude',
  revolve: 'Revolve',
  fillet: 'Fillet',
  chamfer: 'Chamfer',
  shell: 'Shell',
  mirror: 'Mirror',
};

function edgeMatches(tag: EdgeTag, selection: EdgeSelection): boolean {
  return selection === 'all' || tag === selection;
}

export class MemoryDocument implements CadDocument {
  private readonly sketches: Sketch[] = [];
  private readonly bodies: Body[] = [];
  private readonly features: Feature[] = [];
  private readonly counters = new Map<string, number>();

  constructor(readonly name: string) {}

  // ─── Inspection ─────────────────────────────────────────────────

  sceneInfo(): SceneInfo {
    return {
      design: this.name,
      units: 'mm',
      sketches: this.sketches.map(summarizeSketch),
      bodies: this.bodies.map(summarizeBody),
      features: this.features.map(({ name, type }) => ({ name, type })),
    };
  }

  objectInfo(name: string): ObjectInfo {
    const body = this.bodies.find((b) => b.name === name);
    if (body) return { type: 'body', ...summarizeBody(body) };
    const sketch = this.sketches.find((s) => s.name === name);
    if (sketch) return { type: 'sketch', ...summarizeSketch(sketch) };
    throw new DocumentError(`No body or sketch named "${name}".`);
  }

  // ─── Sketching ──────────────────────────────────────────────────

  createSketch(plane: PlaneName): SketchResult {
    const sketch: Sketch = { name: this.nextName('Sketch'), plane, curves: [] };
    this.sketches.push(sketch);
    return { sketch: sketch.name, plane };
  }

  drawRectangle(corner: Point3, width: number, height: number): CurveResult {
    return this.addCurve({ kind: 'rectangle', corner, width, height });
  }

  drawCircle(center: Point3, radius: number): CurveResult {
    return this.addCurve({ kind: 'circle', center, radius });
  }

  drawLine(start: Point3, end: Point3): CurveResult {
    return this.addCurve({ kind: 'line', start, end });
  }

  // ─── Features ───────────────────────────────────────────────────

  extrude(options: ExtrudeOptions): FeatureResult {
    const profile = this.profileAt(options.profileIndex);
    if (options.operation !== 'new_body') {
      const target = this.lastBody();
      return this.record('extrude', [target.name]);
    }
    const body = profile.kind === 'circle'
      ? this.addBody(CYLINDER_EDGES, CYLINDER_FACES)
      : this.addBody(PRISM_EDGES, PRISM_FACES);
    return this.record('extrude', [body.name]);
  }

  revolve(options: RevolveOptions): FeatureResult {
    const profile = this.profileAt(options.profileIndex);
    if (options.axisDirection.every((c) => c === 0)) {
      throw new DocumentError('Revolve axis direction must not be zero.');
    }
    if (options.operation !== 'new_body') {
      return this.record('revolve', [this.lastBody().name]);
    }
    const sides = profile.kind === 'circle' ? 1 : 4;
    const faces: FaceTag[] = Array.from({ length: sides }, (): FaceTag => 'side');
    // A partial revolve is capped by two planar end faces.
    if (options.angle < 360) faces.push('front', 'back');
    const body = this.addBody(Array.from({ length: sides }, (): EdgeTag => 'other'), faces);
    return this.record('revolve', [body.name]);
  }

  fillet(options: EdgeFeatureOptions): FeatureResult {
    return this.blendEdges('fillet', options);
  }

  chamfer(options: EdgeFeatureOptions): FeatureResult {
    return this.blendEdges('chamfer', options);
  }

  shell(options: ShellOptions): FeatureResult {
    const body = this.bodyAt(options.bodyIndex);
    const remaining = body.faces.filter((face) => face !== options.face);
    if (remaining.length === body.faces.length) {
      throw new DocumentError(`No ${options.face} face found on ${body.name}.`);
    }
    body.faces = remaining;
    return this.record('shell', [body.name]);
  }

  mirror(options: MirrorOptions): FeatureResult {
    const source = this.bodyAt(options.bodyIndex);
    const copy = this.addBody(source.edges, source.faces);
    return this.record('mirror', [copy.name]);
  }

  runCode(_code: string): unknown {
    throw new DocumentError('Code execution needs a live Fusion 360 session.');
  }

  // ─── Internals ──────────────────────────────────────────────────

  private nextName(prefix: string): string {
    const n = (this.counters.get(prefix) ?? 0) + 1;
    this.counters.set(prefix, n);
    return `${prefix}${n}`;
  }

  private activeSketch(): Sketch {
    const sketch = this.sketches[this.sketches.length - 1];
    if (!sketch) throw new DocumentError('No sketch available. Create a sketch first.');
    return sketch;
  }

  private addCurve(curve: Curve): CurveResult {
    const sketch = this.activeSketch();
    sketch.curves.push(curve);
    return { sketch: sketch.name, curve: curve.kind, profiles: profilesOf(sketch).length };
  }

  private profileAt(index: number): Curve {
    const profiles = profilesOf(this.activeSketch());
    if (profiles.length === 0) {
      throw new DocumentError('No closed profiles in the active sketch.');
    }
    const profile = profiles[index];
    if (!profile) {
      throw new DocumentError(`Profile index ${index} out of range (${profiles.length} profiles).`);
    }
    return profile;
  }

  private lastBody(): Body {
    const body = this.bodies[this.bodies.length - 1];
    if (!body) throw new DocumentError('No bodies available.');
    return body;
  }

  private bodyAt(index: number): Body {
    if (this.bodies.length === 0) throw new DocumentError('No bodies available.');
    const body = this.bodies[index];
    if (!body) {
      throw new DocumentError(`Body index ${index} out of range (${this.bodies.length} bodies).`);
    }
    return body;
  }

  private addBody(edges: EdgeTag[], faces: FaceTag[]): Body {
    const body: Body = { name: this.nextName('Body'), edges: [...edges], faces: [...faces] };
    this.bodies.push(body);
    return body;
  }

  /** Each selected edge gains one blend face. */
  private blendEdges(type: 'fillet' | 'chamfer', options: EdgeFeatureOptions): FeatureResult {
    const body = this.bodyAt(options.bodyIndex);
    const selected = body.edges.filter((tag) => edgeMatches(tag, options.edges));
    if (selected.length === 0) {
      throw new DocumentError(`No ${options.edges} edges found on ${body.name}.`);
    }
    for (let i = 0; i < selected.length; i++) body.faces.push('blend');
    return this.record(type, [body.name]);
  }

  private record(type: FeatureType, bodies: string[]): FeatureResult {
    const feature: Feature = { name: this.nextName(TITLES[type]), type, bodies };
    this.features.push(feature);
    return { feature: feature.name, bodies };
  }
}

function profilesOf(sketch: Sketch): Curve[] {
  return sketch.curves.filter((curve) => curve.kind !== 'line');
}

function summarizeSketch(sketch: Sketch): SketchSummary {
  return {
    name: sketch.name,
    plane: sketch.plane,
    curves: sketch.curves.length,
    profiles: profilesOf(sketch).length,
  };
}

function summarizeBody(body: Body): BodySummary {
  return { name: body.name, edges: body.edges.length, faces: body.faces.length };
}

// ─── Host ───────────────────────────────────────────────────────

/** Holds at most one open MemoryDocument. */
export class MemoryDocumentHost implements DocumentHost {
  private active: MemoryDocument | null = null;
  private opened = 0;

  open(name?: string): MemoryDocument {
    this.opened++;
    this.active = new MemoryDocument(name ?? `Untitled${this.opened}`);
    return this.active;
  }

  close(): void {
    this.active = null;
  }

  activeDocument(): MemoryDocument | null {
    return this.active;
  }
}
