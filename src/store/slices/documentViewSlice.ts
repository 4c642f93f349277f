import { create } from 'zustand';
import type { DocumentInfo, PagePreview } from '../../types';

interface DocumentViewState {
  // State
  document: DocumentInfo | null;
  currentPage: number;
  previews: PagePreview[];
  previewsRendering: boolean;
  lastDir: string;

  // Actions
  setDocument: (document: DocumentInfo | null) => void;
  /** Returns false when the index is outside the open document */
  setCurrentPage: (pageIndex: number) => boolean;
  setPreviews: (previews: PagePreview[], rendering: boolean) => void;
  setLastDir: (lastDir: string) => void;
  reset: () => void;

  // Getters
  getPageCount: () => number;
}

const initialState = {
  document: null,
  currentPage: 0,
  previews: [],
  previewsRendering: false,
  lastDir: '',
};

export const useDocumentViewStore = create<DocumentViewState>()((set, get) => ({
  ...initialState,

  setDocument: (document) => {
    set({ document, currentPage: 0, previews: [], previewsRendering: document !== null });
  },

  setCurrentPage: (pageIndex) => {
    const pageCount = get().getPageCount();
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= pageCount) {
      return false;
    }
    set({ currentPage: pageIndex });
    return true;
  },

  setPreviews: (previews, rendering) => {
    set({ previews, previewsRendering: rendering });
  },

  setLastDir: (lastDir) => {
    set({ lastDir });
  },

  reset: () => {
    set(initialState);
  },

  getPageCount: () => get().document?.pageCount ?? 0,
}));
