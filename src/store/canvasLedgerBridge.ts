import type { ShapeEvent } from '../types';
import { getColorByName } from '../lib/takeoffOptions';
import { shapeEvents, type ShapeEventBus } from '../lib/shapeEvents';
import { useCanvasStore } from './slices/canvasSlice';
import { useCategoryStore } from './slices/categorySlice';

const applyShapeEvent = (event: ShapeEvent): void => {
  const ledger = useCategoryStore.getState();
  switch (event.type) {
    case 'created':
      if (event.entryId === null) {
        console.warn(`⚠️ SHAPE_CREATED: No active takeoff, shape ${event.shape.id} not counted`);
        return;
      }
      ledger.attachShape(event.entryId, event.shape);
      return;
    case 'lifted':
    case 'deleted':
      ledger.detachShape(event.shape.id);
      return;
  }
};

/**
 * Keep the ledger in step with the canvas: committed shapes join the active
 * entry, lifted or deleted shapes leave theirs. Also drops the active entry
 * from the canvas once it is removed and follows changes to its color.
 * Returns a disconnect function.
 */
export const connectCanvasToLedger = (bus: ShapeEventBus = shapeEvents): (() => void) => {
  const unsubscribeShapes = bus.subscribe(applyShapeEvent);

  const unsubscribeLedger = useCategoryStore.subscribe((state) => {
    const canvas = useCanvasStore.getState();
    if (canvas.activeEntryId === null) return;

    const active = state.getEntryById(canvas.activeEntryId);
    if (!active) {
      canvas.clearActiveEntry();
      return;
    }

    const color = getColorByName(active.colorName);
    const current = canvas.activeColor;
    if (canvas.mode.status !== 'moving' && (color.r !== current.r || color.g !== current.g || color.b !== current.b)) {
      canvas.setActiveColor(color);
    }
  });

  return () => {
    unsubscribeShapes();
    unsubscribeLedger();
  };
};
