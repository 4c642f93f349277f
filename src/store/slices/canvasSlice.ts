import { create } from 'zustand';
import type {
  CanvasMode,
  CanvasPointerEvent,
  ContextAction,
  Point,
  RgbColor,
  Shape,
  ShapeContextMenu,
  ShapeKind,
} from '../../types';
import { DEFAULT_LINE_WIDTH, HIGHLIGHT_DISPLAY_OPACITY, getColorByName } from '../../lib/takeoffOptions';
import { shapeEvents } from '../../lib/shapeEvents';
import {
  commitShape,
  createTemplateShape,
  dragShapeTo,
  hitTestShape,
  placeShapeAt,
  toTemplate,
} from '../../utils/shapeGeometry';
import { useCategoryStore } from './categorySlice';
import { useDocumentViewStore } from './documentViewSlice';

const SHAPE_ACTIONS: readonly ContextAction[] = ['move', 'delete'];

interface CanvasState {
  // State
  mode: CanvasMode;
  drawShape: ShapeKind;
  /** Entry that receives committed shapes */
  activeEntryId: string | null;
  activeColor: RgbColor;
  activeOpacity: number;
  strokeWidth: number;
  contextMenu: ShapeContextMenu | null;

  // Actions
  startDrawingForEntry: (entryId: string) => boolean;
  setDrawingMode: (enabled: boolean) => void;
  setDrawShape: (kind: ShapeKind) => void;
  setActiveColor: (color: RgbColor) => void;
  clearActiveEntry: () => void;
  pointerDown: (event: CanvasPointerEvent) => void;
  pointerMove: (point: Point) => void;
  pointerUp: (event: CanvasPointerEvent) => void;
  chooseContextAction: (action: ContextAction) => void;
  dismissContextMenu: () => void;
  reset: () => void;

  // Getters
  isDrawingEnabled: () => boolean;
  /** Uncommitted shape that follows the pointer, if any */
  getPreviewShape: () => Shape | null;
}

type CanvasData = Pick<
  CanvasState,
  'mode' | 'drawShape' | 'activeEntryId' | 'activeColor' | 'activeOpacity' | 'strokeWidth' | 'contextMenu'
>;

const initialState: CanvasData = {
  mode: { status: 'idle' },
  drawShape: 'rectangle',
  activeEntryId: null,
  activeColor: getColorByName(''),
  activeOpacity: HIGHLIGHT_DISPLAY_OPACITY,
  strokeWidth: DEFAULT_LINE_WIDTH,
  contextMenu: null,
};

const currentPage = (): number => useDocumentViewStore.getState().currentPage;

/** Topmost shape on the displayed page under the point */
const findShapeAt = (point: Point): Shape | undefined => {
  const shapes = useCategoryStore.getState().getShapesOnPage(currentPage());
  for (let i = shapes.length - 1; i >= 0; i--) {
    if (hitTestShape(shapes[i], point)) {
      return shapes[i];
    }
  }
  return undefined;
};

export const useCanvasStore = create<CanvasState>()((set, get) => {
  const commit = (shape: Shape): Shape => {
    const committed = commitShape(shape, currentPage());
    shapeEvents.emit({ type: 'created', shape: committed, entryId: get().activeEntryId });
    return committed;
  };

  const handlePrimaryDown = (point: Point) => {
    const { mode, drawShape, activeColor, activeOpacity, strokeWidth } = get();

    switch (mode.status) {
      case 'awaitingTemplate': {
        const template = createTemplateShape(drawShape, point, {
          color: activeColor,
          opacity: activeOpacity,
          strokeWidth,
        });
        set({ mode: { status: 'definingTemplate', anchor: point, template } });
        return;
      }
      case 'templateReady': {
        const template = placeShapeAt(mode.template, point);
        // Listeners of the commit may restyle the template; settle the mode first
        set({ mode: { status: 'templateReady', template } });
        commit(template);
        return;
      }
      case 'moving': {
        const placed = placeShapeAt(mode.shape, point);
        set({ mode: { status: 'templateReady', template: toTemplate(placed) } });
        commit(placed);
        return;
      }
      default:
        return;
    }
  };

  const handleSecondaryDown = (point: Point) => {
    const { mode } = get();

    if (mode.status === 'moving') {
      shapeEvents.emit({ type: 'deleted', shape: mode.shape });
      set({ mode: { status: 'awaitingTemplate' } });
      return;
    }

    const target = findShapeAt(point);
    if (target) {
      set({ contextMenu: { shapeId: target.id, actions: SHAPE_ACTIONS } });
      return;
    }

    if (mode.status !== 'idle') {
      get().setDrawingMode(false);
    }
  };

  return {
    ...initialState,

    startDrawingForEntry: (entryId) => {
      const entry = useCategoryStore.getState().getEntryById(entryId);
      if (!entry) {
        console.warn(`⚠️ START_DRAWING: Entry ${entryId} not found`);
        return false;
      }
      if (get().mode.status === 'moving') {
        get().setDrawingMode(false);
      }
      set({
        activeEntryId: entry.id,
        activeColor: getColorByName(entry.colorName),
        drawShape: 'rectangle',
        mode: { status: 'awaitingTemplate' },
        contextMenu: null,
      });
      return true;
    },

    setDrawingMode: (enabled) => {
      const { mode } = get();
      if (enabled) {
        if (mode.status === 'idle') {
          set({ mode: { status: 'awaitingTemplate' } });
        }
        return;
      }
      if (mode.status === 'moving') {
        shapeEvents.emit({ type: 'deleted', shape: mode.shape });
      }
      set({ mode: { status: 'idle' }, contextMenu: null });
    },

    setDrawShape: (kind) => {
      const { mode, drawShape } = get();
      if (kind === drawShape) return;
      if (mode.status === 'definingTemplate' || mode.status === 'templateReady') {
        set({ drawShape: kind, mode: { status: 'awaitingTemplate' } });
        return;
      }
      set({ drawShape: kind });
    },

    setActiveColor: (color) => {
      const { mode } = get();
      if (mode.status === 'definingTemplate' || mode.status === 'templateReady') {
        set({ activeColor: color, mode: { ...mode, template: { ...mode.template, color } } });
        return;
      }
      set({ activeColor: color });
    },

    clearActiveEntry: () => {
      get().setDrawingMode(false);
      set({ activeEntryId: null });
    },

    pointerDown: ({ button, point }) => {
      if (get().contextMenu) {
        set({ contextMenu: null });
        return;
      }
      if (button === 'primary') {
        handlePrimaryDown(point);
      } else {
        handleSecondaryDown(point);
      }
    },

    pointerMove: (point) => {
      const { mode } = get();
      switch (mode.status) {
        case 'definingTemplate':
          set({ mode: { ...mode, template: dragShapeTo(mode.template, mode.anchor, point) } });
          return;
        case 'templateReady':
          set({ mode: { status: 'templateReady', template: placeShapeAt(mode.template, point) } });
          return;
        case 'moving':
          set({ mode: { status: 'moving', shape: placeShapeAt(mode.shape, point) } });
          return;
        default:
          return;
      }
    },

    pointerUp: ({ button, point }) => {
      const { mode } = get();
      if (button !== 'primary' || mode.status !== 'definingTemplate') return;

      const template = dragShapeTo(mode.template, mode.anchor, point);
      set({ mode: { status: 'templateReady', template } });
      commit(template);
    },

    chooseContextAction: (action) => {
      const menu = get().contextMenu;
      if (!menu) return;
      set({ contextMenu: null });

      const ledger = useCategoryStore.getState();
      const owner = ledger.findEntryForShape(menu.shapeId);
      const shape = owner?.shapes.find((s) => s.id === menu.shapeId);
      if (!owner || !shape) return;

      if (action === 'delete') {
        shapeEvents.emit({ type: 'deleted', shape });
        return;
      }

      shapeEvents.emit({ type: 'lifted', shape });
      set({
        activeEntryId: owner.id,
        activeColor: shape.color,
        drawShape: shape.kind,
        mode: { status: 'moving', shape },
      });
    },

    dismissContextMenu: () => {
      set({ contextMenu: null });
    },

    reset: () => {
      set(initialState);
    },

    isDrawingEnabled: () => get().mode.status !== 'idle',

    getPreviewShape: () => {
      const { mode } = get();
      switch (mode.status) {
        case 'definingTemplate':
        case 'templateReady':
          return mode.template;
        case 'moving':
          return mode.shape;
        default:
          return null;
      }
    },
  };
});
