/**
 * CadDocument: the capability handlers are given to act on a design.
 *
 * Handlers never reach for global application state; the executor looks
 * up the active document through a DocumentHost and passes it in.
 * Lengths are millimetres, angles degrees.
 */

import { CadLinkError } from '@cadlink/protocol';
import type {
  EdgeSelection,
  ExtrudeDirection,
  FaceSelection,
  FeatureOperation,
  PlaneName,
} from '@cadlink/protocol';

export type Point3 = readonly [number, number, number];

export type CurveKind = 'rectangle' | 'circle' | 'line';
export type FeatureType = 'extrude' | 'revolve' | 'fillet' | 'chamfer' | 'shell' | 'mirror';

// ─── Inspection ─────────────────────────────────────────────────

export interface SketchSummary {
  name: string;
  plane: PlaneName;
  curves: number;
  profiles: number;
}

export interface BodySummary {
  name: string;
  edges: number;
  faces: number;
}

export interface FeatureSummary {
  name: string;
  type: FeatureType;
}

export interface SceneInfo {
  design: string;
  units: 'mm';
  sketches: SketchSummary[];
  bodies: BodySummary[];
  features: FeatureSummary[];
}

export type ObjectInfo = ({ type: 'sketch' } & SketchSummary) | ({ type: 'body' } & BodySummary);

// ─── Operation results ─────────────────────────────────────────

export interface SketchResult {
  sketch: string;
  plane: PlaneName;
}

export interface CurveResult {
  sketch: string;
  curve: CurveKind;
  profiles: number;
}

export interface FeatureResult {
  feature: string;
  bodies: string[];
}

// ─── Operation inputs ──────────────────────────────────────────

export interface ExtrudeOptions {
  profileIndex: number;
  distance: number;
  operation: FeatureOperation;
  direction: ExtrudeDirection;
}

export interface RevolveOptions {
  profileIndex: number;
  axisOrigin: Point3;
  axisDirection: Point3;
  angle: number;
  operation: FeatureOperation;
}

/** Fillet radius or chamfer distance applied to a set of edges. */
export interface EdgeFeatureOptions {
  bodyIndex: number;
  size: number;
  edges: EdgeSelection;
}

export interface ShellOptions {
  bodyIndex: number;
  thickness: number;
  face: FaceSelection;
}

export interface MirrorOptions {
  bodyIndex: number;
  plane: PlaneName;
}

export interface CadDocument {
  readonly name: string;
  sceneInfo(): SceneInfo;
  objectInfo(name: string): ObjectInfo;
  createSketch(plane: PlaneName): SketchResult;
  drawRectangle(corner: Point3, width: number, height: number): CurveResult;
  drawCircle(center: Point3, radius: number): CurveResult;
  drawLine(start: Point3, end: Point3): CurveResult;
  extrude(options: ExtrudeOptions): FeatureResult;
  revolve(options: RevolveOptions): FeatureResult;
  fillet(options: EdgeFeatureOptions): FeatureResult;
  chamfer(options: EdgeFeatureOptions): FeatureResult;
  shell(options: ShellOptions): FeatureResult;
  mirror(options: MirrorOptions): FeatureResult;
  runCode(code: string): unknown;
}

export interface DocumentHost {
  activeDocument(): CadDocument | null;
}

/** A failure reported by the document itself (missing sketch, bad index). */
export class DocumentError extends CadLinkError {
  constructor(message: string) {
    super('HANDLER_ERROR', message);
    this.name = 'DocumentError';
  }
}
