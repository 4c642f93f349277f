import { toast } from 'sonner';
import { useCanvasStore, useCategoryStore, useDocumentViewStore } from '../store';
import type { DocumentInfo } from '../types';
import { extractErrorMessage } from '../utils/commonUtils';
import { toShapeDescriptor } from '../utils/shapeGeometry';
import { buildEstimateSections } from '../utils/takeoffTotals';
import { documentService, settingsService } from './apiService';

const requireDocument = (): DocumentInfo | null => {
  const { document } = useDocumentViewStore.getState();
  if (!document) {
    toast.warning('No document is open');
  }
  return document;
};

/**
 * Read persisted settings (last directory) at startup
 */
export async function loadSettings(): Promise<void> {
  try {
    const settings = await settingsService.getSettings();
    useDocumentViewStore.getState().setLastDir(settings.lastDir);
  } catch (error) {
    console.warn('⚠️ LOAD_SETTINGS: Using defaults:', extractErrorMessage(error));
  }
}

/**
 * Open a drawing. On failure nothing changes; on success shapes of the
 * previous drawing are dropped while takeoff entries stay.
 */
export async function openDocument(path: string): Promise<boolean> {
  let opened: DocumentInfo;
  try {
    opened = await documentService.openDocument(path);
  } catch (error) {
    console.error('❌ OPEN_DOCUMENT:', error);
    toast.error(`Failed to open document: ${extractErrorMessage(error)}`);
    return false;
  }

  const previous = useDocumentViewStore.getState().document;
  if (previous) {
    try {
      await documentService.closeDocument(previous.id);
    } catch (error) {
      console.warn('⚠️ OPEN_DOCUMENT: Previous session not closed:', extractErrorMessage(error));
    }
  }

  useCanvasStore.getState().setDrawingMode(false);
  useCategoryStore.getState().clearShapes();
  useDocumentViewStore.getState().setDocument(opened);
  // The back end records the drawing's directory on every successful open
  await loadSettings();

  console.log(`✅ OPEN_DOCUMENT: ${opened.path} (${opened.pageCount} pages)`);
  toast.success(`Opened ${opened.path}`);
  return true;
}

export function goToPage(pageIndex: number): boolean {
  return useDocumentViewStore.getState().setCurrentPage(pageIndex);
}

/**
 * Pull the latest preview list for the open document
 */
export async function refreshPreviews(): Promise<boolean> {
  const document = useDocumentViewStore.getState().document;
  if (!document) return false;
  try {
    const { previews, rendering } = await documentService.getPreviews(document.id);
    useDocumentViewStore.getState().setPreviews(previews, rendering);
    return true;
  } catch (error) {
    console.warn('⚠️ REFRESH_PREVIEWS:', extractErrorMessage(error));
    return false;
  }
}

async function writeAnnotatedDocument(destinationPath?: string): Promise<string | null> {
  const document = requireDocument();
  if (!document) return null;

  const shapes = useCategoryStore.getState().getAllShapes().map(toShapeDescriptor);
  try {
    const savedPath = await documentService.saveDocument(document.id, shapes, destinationPath);
    console.log(`✅ SAVE_DOCUMENT: ${shapes.length} shapes written to ${savedPath}`);
    toast.success(`Saved ${savedPath}`);
    return savedPath;
  } catch (error) {
    console.error('❌ SAVE_DOCUMENT:', error);
    toast.error(`Save failed, the original document is unchanged: ${extractErrorMessage(error)}`);
    return null;
  }
}

/** Write every shape into the document's own file */
export function saveDocument(): Promise<string | null> {
  return writeAnnotatedDocument();
}

export function saveDocumentAs(destinationPath: string): Promise<string | null> {
  return writeAnnotatedDocument(destinationPath);
}

/**
 * Export named takeoffs per category plus total labor. Labor covers every
 * entry, named or not.
 */
export async function exportSpreadsheet(): Promise<string | null> {
  const document = requireDocument();
  if (!document) return null;

  const { categories, totals } = useCategoryStore.getState();
  const sections = buildEstimateSections(categories);
  try {
    const exportedPath = await documentService.exportSpreadsheet(document.id, sections, totals.totalHours);
    toast.success(`Exported ${exportedPath}`);
    return exportedPath;
  } catch (error) {
    console.error('❌ EXPORT_SPREADSHEET:', error);
    toast.error(`Export failed: ${extractErrorMessage(error)}`);
    return null;
  }
}

export async function closeDocument(): Promise<void> {
  const document = useDocumentViewStore.getState().document;
  if (!document) return;
  try {
    await documentService.closeDocument(document.id);
  } catch (error) {
    console.warn('⚠️ CLOSE_DOCUMENT:', extractErrorMessage(error));
  }
  useCanvasStore.getState().setDrawingMode(false);
  useCategoryStore.getState().clearShapes();
  useDocumentViewStore.getState().setDocument(null);
}
