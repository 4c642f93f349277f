import { describe, it, expect, beforeEach } from 'vitest';
import type { DocumentInfo } from '../../types';
import { useDocumentViewStore } from './documentViewSlice';

const plan: DocumentInfo = {
  id: 'doc-1',
  path: '/plans/level-1.pdf',
  pageCount: 3,
  pageBounds: [
    { width: 600, height: 800 },
    { width: 600, height: 800 },
    { width: 842, height: 595 },
  ],
};

describe('useDocumentViewStore', () => {
  beforeEach(() => {
    useDocumentViewStore.getState().reset();
  });

  it('starts a new document on its first page with previews pending', () => {
    useDocumentViewStore.getState().setPreviews([{ pageIndex: 0, width: 1, height: 1, scale: 0.2 }], false);

    useDocumentViewStore.getState().setDocument(plan);

    const state = useDocumentViewStore.getState();
    expect(state.currentPage).toBe(0);
    expect(state.previews).toEqual([]);
    expect(state.previewsRendering).toBe(true);
    expect(state.getPageCount()).toBe(3);
  });

  it('only moves to pages that exist', () => {
    const store = useDocumentViewStore.getState();
    expect(store.setCurrentPage(0)).toBe(false);

    store.setDocument(plan);
    expect(store.setCurrentPage(2)).toBe(true);
    expect(store.setCurrentPage(3)).toBe(false);
    expect(store.setCurrentPage(-1)).toBe(false);
    expect(store.setCurrentPage(1.5)).toBe(false);
    expect(useDocumentViewStore.getState().currentPage).toBe(2);
  });

  it('clears the page count when the document is closed', () => {
    useDocumentViewStore.getState().setDocument(plan);
    useDocumentViewStore.getState().setDocument(null);

    expect(useDocumentViewStore.getState().getPageCount()).toBe(0);
    expect(useDocumentViewStore.getState().previewsRendering).toBe(false);
  });
});
