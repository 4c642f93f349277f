// Shared type definitions for the takeoff markup session

export interface Point {
  x: number;
  y: number;
}

/** Color components in the 0-1 range */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/** Rectangle in page-local coordinates, normalized so x0 <= x1 and y0 <= y1 */
export interface RectGeometry {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface LineGeometry {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export type ShapeKind = 'rectangle' | 'line';

/** Page index used by templates that have not been committed to a page */
export const UNASSIGNED_PAGE = -1;

interface ShapeBase {
  id: string;
  pageIndex: number;
  color: RgbColor;
  /** Display-only alpha (0-1); never written to the document */
  opacity: number;
}

export interface RectangleShape extends ShapeBase {
  kind: 'rectangle';
  geometry: RectGeometry;
}

export interface LineShape extends ShapeBase {
  kind: 'line';
  geometry: LineGeometry;
  strokeWidth: number;
}

export type Shape = RectangleShape | LineShape;

/**
 * Flat, serializable form of a committed shape. This is what crosses the
 * document mutation boundary.
 */
export type ShapeDescriptor =
  | { kind: 'rectangle'; pageIndex: number; geometry: RectGeometry; color: RgbColor }
  | { kind: 'line'; pageIndex: number; geometry: LineGeometry; color: RgbColor; strokeWidth: number };

export type WireMaterial = 'CU' | 'AL';

export interface WireAttributes {
  type: string;
  cableSpec: string;
  material: WireMaterial;
  /** Raw text from the length field; parsed where consumed */
  length: string;
}

export interface TakeoffEntry {
  id: string;
  /** Display label, e.g. "Takeoff 3" */
  label: string;
  name: string;
  /** Raw text from the labor field; parsed where consumed */
  labor: string;
  colorName: string;
  notes: string;
  wire?: WireAttributes;
  shapes: Shape[];
}

export interface TakeoffCategory {
  name: string;
  wireEnabled: boolean;
  /** False for the demolition category, which is left out of device and wire totals */
  countsDevices: boolean;
  entries: TakeoffEntry[];
}

export interface WireTotal {
  type: string;
  cableSpec: string;
  material: WireMaterial;
  length: number;
}

export interface TakeoffTotals {
  totalHours: number;
  totalDeviceCount: number;
  totalPointCount: number;
  wireTotals: WireTotal[];
}

export type PointerButton = 'primary' | 'secondary';

export interface CanvasPointerEvent {
  button: PointerButton;
  /** Page-local coordinates */
  point: Point;
}

export type ContextAction = 'move' | 'delete';

export interface ShapeContextMenu {
  shapeId: string;
  actions: readonly ContextAction[];
}

export type CanvasMode =
  | { status: 'idle' }
  | { status: 'awaitingTemplate' }
  | { status: 'definingTemplate'; anchor: Point; template: Shape }
  | { status: 'templateReady'; template: Shape }
  | { status: 'moving'; shape: Shape };

export type ShapeEvent =
  | { type: 'created'; shape: Shape; entryId: string | null }
  /** Shape picked up for a move; it leaves its entry until dropped again */
  | { type: 'lifted'; shape: Shape }
  | { type: 'deleted'; shape: Shape };

export interface PageBounds {
  width: number;
  height: number;
}

export interface DocumentInfo {
  id: string;
  path: string;
  pageCount: number;
  pageBounds: PageBounds[];
}

export interface PagePreview {
  pageIndex: number;
  width: number;
  height: number;
  scale: number;
}

export interface EstimateRow {
  name: string;
  count: number;
}

export interface EstimateSection {
  category: string;
  rows: EstimateRow[];
}

export interface AppSettings {
  lastDir: string;
}
