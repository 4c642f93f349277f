// Export all store slices
export { useCategoryStore } from './categorySlice';
export type { EntryUpdate } from './categorySlice';
export { useCanvasStore } from './canvasSlice';
export { useDocumentViewStore } from './documentViewSlice';
