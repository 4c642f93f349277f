import { describe, it, expect } from 'vitest';
import type { LineShape, RectangleShape } from '../types';
import {
  rectFromPoints,
  createTemplateShape,
  dragShapeTo,
  placeShapeAt,
  commitShape,
  hitTestShape,
  toShapeDescriptor,
} from './shapeGeometry';

const style = { color: { r: 1, g: 0, b: 0 }, opacity: 0.5, strokeWidth: 2 };

const rect: RectangleShape = {
  id: 'rect-1',
  kind: 'rectangle',
  pageIndex: 2,
  geometry: { x0: 10, y0: 10, x1: 50, y1: 40 },
  color: { r: 0, g: 0, b: 1 },
  opacity: 0.3,
};

const line: LineShape = {
  id: 'line-1',
  kind: 'line',
  pageIndex: 0,
  geometry: { x1: 0, y1: 0, x2: 100, y2: 0 },
  color: { r: 0, g: 1, b: 0 },
  opacity: 1,
  strokeWidth: 2,
};

describe('shapeGeometry', () => {
  describe('rectFromPoints', () => {
    it('normalizes corners given in any order', () => {
      expect(rectFromPoints({ x: 50, y: 40 }, { x: 10, y: 10 })).toEqual({ x0: 10, y0: 10, x1: 50, y1: 40 });
      expect(rectFromPoints({ x: 50, y: 10 }, { x: 10, y: 40 })).toEqual({ x0: 10, y0: 10, x1: 50, y1: 40 });
    });
  });

  describe('createTemplateShape / dragShapeTo', () => {
    it('starts a rectangle template as a zero-size rect on no page', () => {
      const template = createTemplateShape('rectangle', { x: 5, y: 6 }, style);
      expect(template.pageIndex).toBe(-1);
      expect(template.geometry).toEqual({ x0: 5, y0: 6, x1: 5, y1: 6 });
    });

    it('drags a rectangle backwards and keeps it normalized', () => {
      const template = createTemplateShape('rectangle', { x: 50, y: 40 }, style);
      const dragged = dragShapeTo(template, { x: 50, y: 40 }, { x: 10, y: 10 });
      expect(dragged.geometry).toEqual({ x0: 10, y0: 10, x1: 50, y1: 40 });
    });

    it('drags a line from anchor to pointer', () => {
      const template = createTemplateShape('line', { x: 1, y: 2 }, style);
      const dragged = dragShapeTo(template, { x: 1, y: 2 }, { x: 30, y: 4 });
      expect(dragged.geometry).toEqual({ x1: 1, y1: 2, x2: 30, y2: 4 });
      expect(dragged.kind === 'line' && dragged.strokeWidth).toBe(2);
    });
  });

  describe('placeShapeAt', () => {
    it('moves a rectangle by its top-left corner and keeps its size', () => {
      expect(placeShapeAt(rect, { x: 100, y: 100 }).geometry).toEqual({ x0: 100, y0: 100, x1: 140, y1: 130 });
    });

    it('moves a line by its first endpoint and keeps its direction', () => {
      expect(placeShapeAt(line, { x: 5, y: 5 }).geometry).toEqual({ x1: 5, y1: 5, x2: 105, y2: 5 });
    });
  });

  describe('commitShape', () => {
    it('assigns a page and a fresh id', () => {
      const committed = commitShape({ ...rect, pageIndex: -1 }, 4);
      expect(committed.pageIndex).toBe(4);
      expect(committed.id).not.toBe(rect.id);
      expect(committed.geometry).toEqual(rect.geometry);
    });
  });

  describe('hitTestShape', () => {
    it('hits points inside and on the edge of a rectangle', () => {
      expect(hitTestShape(rect, { x: 20, y: 20 })).toBe(true);
      expect(hitTestShape(rect, { x: 50, y: 40 })).toBe(true);
      expect(hitTestShape(rect, { x: 51, y: 20 })).toBe(false);
    });

    it('hits points near a line within the pick tolerance', () => {
      expect(hitTestShape(line, { x: 50, y: 2 })).toBe(true);
      expect(hitTestShape(line, { x: 50, y: 5 })).toBe(false);
      expect(hitTestShape(line, { x: 103, y: 0 })).toBe(true);
    });
  });

  describe('toShapeDescriptor', () => {
    it('drops display-only fields from rectangles', () => {
      expect(toShapeDescriptor(rect)).toEqual({
        kind: 'rectangle',
        pageIndex: 2,
        geometry: { x0: 10, y0: 10, x1: 50, y1: 40 },
        color: { r: 0, g: 0, b: 1 },
      });
    });

    it('keeps the stroke width of lines', () => {
      expect(toShapeDescriptor(line)).toEqual({
        kind: 'line',
        pageIndex: 0,
        geometry: { x1: 0, y1: 0, x2: 100, y2: 0 },
        color: { r: 0, g: 1, b: 0 },
        strokeWidth: 2,
      });
    });
  });
});
