import path from 'path';
import fs from 'fs-extra';
import { PDFDocument } from 'pdf-lib';
import { v4 as uuidv4 } from 'uuid';
import { DocumentLoadError, NotFoundError } from '../errors';
import type { DocumentInfo, EstimateSection, PagePreview, ShapeDescriptor } from '../types';
import type { DocumentMutationService } from './documentMutationService';
import { PagePreviewRenderer } from './pagePreviewRenderer';
import { withRenderingPaused } from './renderPauseGuard';
import type { SettingsStore } from './settingsStore';
import { exportEstimateSpreadsheet, spreadsheetPathFor } from './spreadsheetExportService';

interface DocumentSession {
  info: DocumentInfo;
  /** Bytes as read at open time; every save starts from these */
  originalBytes: Uint8Array;
  renderer: PagePreviewRenderer;
}

export type DocumentMutator = Pick<DocumentMutationService, 'mutate'>;

export interface DocumentSessionDependencies {
  mutator: DocumentMutator;
  settings: SettingsStore;
  previewScale: number;
}

export class DocumentSessionService {
  private readonly sessions = new Map<string, DocumentSession>();

  constructor(private readonly deps: DocumentSessionDependencies) {}

  /**
   * Read and parse a document. Nothing is kept when either step fails.
   */
  async open(filePath: string): Promise<DocumentInfo> {
    const resolvedPath = path.resolve(filePath);

    let bytes: Buffer;
    try {
      bytes = await fs.readFile(resolvedPath);
    } catch (error) {
      throw new DocumentLoadError(resolvedPath, error);
    }

    let document: PDFDocument;
    try {
      document = await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
      throw new DocumentLoadError(resolvedPath, error);
    }
    if (document.getPageCount() === 0) {
      throw new DocumentLoadError(resolvedPath, 'document has no pages');
    }

    const info: DocumentInfo = {
      id: uuidv4(),
      path: resolvedPath,
      pageCount: document.getPageCount(),
      pageBounds: document.getPages().map((page) => {
        const { width, height } = page.getCropBox();
        return { width, height };
      }),
    };
    const originalBytes = new Uint8Array(bytes);
    const renderer = new PagePreviewRenderer(originalBytes, this.deps.previewScale);
    this.sessions.set(info.id, { info, originalBytes, renderer });
    renderer.start();

    try {
      await this.deps.settings.setLastDir(path.dirname(resolvedPath));
    } catch (error) {
      console.warn('⚠️ OPEN_DOCUMENT: Could not persist settings:', error);
    }

    console.log(`✅ OPEN_DOCUMENT: ${resolvedPath} (${info.pageCount} pages)`);
    return info;
  }

  get(id: string): DocumentInfo {
    return this.requireSession(id).info;
  }

  getPreviews(id: string): { previews: PagePreview[]; rendering: boolean } {
    const { renderer } = this.requireSession(id);
    return { previews: renderer.getPreviews(), rendering: renderer.isRendering() };
  }

  /**
   * Write every shape into a fresh copy of the original bytes. Preview
   * rendering is paused for the duration of the mutation.
   */
  async save(id: string, shapes: ShapeDescriptor[], destinationPath?: string): Promise<string> {
    const session = this.requireSession(id);
    const destination = destinationPath ? path.resolve(destinationPath) : session.info.path;

    return withRenderingPaused(session.renderer, () =>
      this.deps.mutator.mutate(session.originalBytes, shapes, destination)
    );
  }

  async exportSpreadsheet(id: string, sections: EstimateSection[], totalLabor: number): Promise<string> {
    const session = this.requireSession(id);
    return exportEstimateSpreadsheet(sections, totalLabor, spreadsheetPathFor(session.info.path));
  }

  async close(id: string): Promise<void> {
    const session = this.requireSession(id);
    this.sessions.delete(id);
    await session.renderer.stop();
    console.log(`🗑️ CLOSE_DOCUMENT: ${session.info.path}`);
  }

  async closeAll(): Promise<void> {
    await Promise.all(Array.from(this.sessions.keys()).map((id) => this.close(id)));
  }

  private requireSession(id: string): DocumentSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new NotFoundError('Document', id);
    }
    return session;
  }
}
