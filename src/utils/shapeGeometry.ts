import type {
  LineGeometry,
  Point,
  RectGeometry,
  RgbColor,
  Shape,
  ShapeDescriptor,
  ShapeKind,
} from '../types';
import { UNASSIGNED_PAGE } from '../types';
import { generateId } from './commonUtils';

/** Extra pick radius around thin lines, in page units */
const LINE_HIT_TOLERANCE = 3;

/**
 * Build a normalized rectangle from any two opposite corners
 */
export const rectFromPoints = (a: Point, b: Point): RectGeometry => ({
  x0: Math.min(a.x, b.x),
  y0: Math.min(a.y, b.y),
  x1: Math.max(a.x, b.x),
  y1: Math.max(a.y, b.y),
});

export const normalizeRect = (rect: RectGeometry): RectGeometry =>
  rectFromPoints({ x: rect.x0, y: rect.y0 }, { x: rect.x1, y: rect.y1 });

export interface ShapeStyle {
  color: RgbColor;
  opacity: number;
  strokeWidth: number;
}

/**
 * Create an uncommitted template shape anchored at a single point
 */
export const createTemplateShape = (kind: ShapeKind, anchor: Point, style: ShapeStyle): Shape => {
  if (kind === 'rectangle') {
    return {
      id: generateId(),
      kind: 'rectangle',
      pageIndex: UNASSIGNED_PAGE,
      geometry: rectFromPoints(anchor, anchor),
      color: style.color,
      opacity: style.opacity,
    };
  }
  return {
    id: generateId(),
    kind: 'line',
    pageIndex: UNASSIGNED_PAGE,
    geometry: { x1: anchor.x, y1: anchor.y, x2: anchor.x, y2: anchor.y },
    color: style.color,
    opacity: style.opacity,
    strokeWidth: style.strokeWidth,
  };
};

/**
 * Live drag update: rectangles span anchor to pointer (normalized),
 * lines run from the anchor to the pointer.
 */
export const dragShapeTo = (shape: Shape, anchor: Point, pointer: Point): Shape => {
  if (shape.kind === 'rectangle') {
    return { ...shape, geometry: rectFromPoints(anchor, pointer) };
  }
  return { ...shape, geometry: { x1: anchor.x, y1: anchor.y, x2: pointer.x, y2: pointer.y } };
};

/**
 * Move a shape so its reference point sits at `point`, keeping its size.
 * The reference point is the top-left corner for rectangles and the first
 * endpoint for lines.
 */
export const placeShapeAt = (shape: Shape, point: Point): Shape => {
  if (shape.kind === 'rectangle') {
    const { x0, y0, x1, y1 } = shape.geometry;
    return {
      ...shape,
      geometry: { x0: point.x, y0: point.y, x1: point.x + (x1 - x0), y1: point.y + (y1 - y0) },
    };
  }
  const { x1, y1, x2, y2 } = shape.geometry;
  return {
    ...shape,
    geometry: { x1: point.x, y1: point.y, x2: point.x + (x2 - x1), y2: point.y + (y2 - y1) },
  };
};

/**
 * Copy a shape's geometry and style into a new committed shape on a page
 */
export const commitShape = (template: Shape, pageIndex: number): Shape => {
  if (template.kind === 'rectangle') {
    return {
      ...template,
      id: generateId(),
      pageIndex,
      geometry: normalizeRect(template.geometry),
    };
  }
  return { ...template, id: generateId(), pageIndex, geometry: { ...template.geometry } };
};

/**
 * Turn a shape back into a template (unassigned page, fresh id)
 */
export const toTemplate = (shape: Shape): Shape => ({
  ...shape,
  id: generateId(),
  pageIndex: UNASSIGNED_PAGE,
});

const distanceToSegment = (p: Point, line: LineGeometry): number => {
  const dx = line.x2 - line.x1;
  const dy = line.y2 - line.y1;
  const lengthSquared = dx * dx + dy * dy;
  if (lengthSquared === 0) {
    return Math.hypot(p.x - line.x1, p.y - line.y1);
  }
  const t = Math.max(0, Math.min(1, ((p.x - line.x1) * dx + (p.y - line.y1) * dy) / lengthSquared));
  return Math.hypot(p.x - (line.x1 + t * dx), p.y - (line.y1 + t * dy));
};

/**
 * Whether a page-local point lands on a shape
 */
export const hitTestShape = (shape: Shape, point: Point): boolean => {
  if (shape.kind === 'rectangle') {
    const { x0, y0, x1, y1 } = shape.geometry;
    return point.x >= x0 && point.x <= x1 && point.y >= y0 && point.y <= y1;
  }
  const tolerance = Math.max(shape.strokeWidth / 2, LINE_HIT_TOLERANCE);
  return distanceToSegment(point, shape.geometry) <= tolerance;
};

/**
 * Flatten a committed shape into the descriptor sent to the document writer
 */
export const toShapeDescriptor = (shape: Shape): ShapeDescriptor => {
  const color = { r: shape.color.r, g: shape.color.g, b: shape.color.b };
  if (shape.kind === 'rectangle') {
    return {
      kind: 'rectangle',
      pageIndex: shape.pageIndex,
      geometry: normalizeRect(shape.geometry),
      color,
    };
  }
  return {
    kind: 'line',
    pageIndex: shape.pageIndex,
    geometry: { ...shape.geometry },
    color,
    strokeWidth: shape.strokeWidth,
  };
};
