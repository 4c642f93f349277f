// Store slices (the session works through these)
export { useCategoryStore, useCanvasStore, useDocumentViewStore } from './slices';
export type { EntryUpdate } from './slices';
export { connectCanvasToLedger } from './canvasLedgerBridge';

export type {
  Shape,
  TakeoffEntry,
  TakeoffCategory,
  TakeoffTotals,
  CanvasMode,
} from '../types';
