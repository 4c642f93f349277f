// Wire types shared by the routes, the mutation worker and the exporters

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

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

export type ShapeDescriptor =
  | { kind: 'rectangle'; pageIndex: number; geometry: RectGeometry; color: RgbColor }
  | { kind: 'line'; pageIndex: number; geometry: LineGeometry; color: RgbColor; strokeWidth: number };

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

/** Message the mutation worker receives: one per process */
export interface MutationRequest {
  originalBytes: Uint8Array;
  shapes: ShapeDescriptor[];
  destinationPath: string;
  logDir: string;
}

export type MutationReport = { type: 'done'; path: string } | { type: 'failed'; message: string; logPath: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const hasNumbers = (value: unknown, keys: readonly string[]): boolean =>
  isRecord(value) && keys.every((key) => isFiniteNumber(value[key]));

const isPageIndex = (value: unknown): boolean => Number.isInteger(value) && typeof value === 'number' && value >= 0;

export function isShapeDescriptor(value: unknown): value is ShapeDescriptor {
  if (!isRecord(value) || !isPageIndex(value.pageIndex) || !hasNumbers(value.color, ['r', 'g', 'b'])) {
    return false;
  }
  if (value.kind === 'rectangle') {
    return hasNumbers(value.geometry, ['x0', 'y0', 'x1', 'y1']);
  }
  if (value.kind === 'line') {
    return hasNumbers(value.geometry, ['x1', 'y1', 'x2', 'y2']) && isFiniteNumber(value.strokeWidth);
  }
  return false;
}

export function isEstimateSection(value: unknown): value is EstimateSection {
  return (
    isRecord(value) &&
    typeof value.category === 'string' &&
    Array.isArray(value.rows) &&
    value.rows.every((row) => isRecord(row) && typeof row.name === 'string' && isFiniteNumber(row.count))
  );
}

export function isMutationRequest(value: unknown): value is MutationRequest {
  return (
    isRecord(value) &&
    value.originalBytes instanceof Uint8Array &&
    Array.isArray(value.shapes) &&
    value.shapes.every(isShapeDescriptor) &&
    typeof value.destinationPath === 'string' &&
    typeof value.logDir === 'string'
  );
}

export function isMutationReport(value: unknown): value is MutationReport {
  if (!isRecord(value)) return false;
  if (value.type === 'done') return typeof value.path === 'string';
  if (value.type === 'failed') return typeof value.message === 'string' && typeof value.logPath === 'string';
  return false;
}
