import { setImmediate as nextTurn } from 'timers/promises';
import { PDFDocument } from 'pdf-lib';
import type { PagePreview } from '../types';

/**
 * Background work that can be stopped (waiting for it to wind down) and
 * started again.
 */
export interface PausableRenderer {
  start(): void;
  stop(): Promise<void>;
  isRendering(): boolean;
}

/**
 * Produces one preview per page in the background, one page per event-loop
 * turn. Stopping keeps what was rendered; starting again resumes with the
 * next page.
 */
export class PagePreviewRenderer implements PausableRenderer {
  private previews: PagePreview[] = [];
  private task: Promise<void> | null = null;
  private cancelRequested = false;
  private failed = false;
  private document: PDFDocument | null = null;

  constructor(
    private readonly source: Uint8Array,
    private readonly scale: number
  ) {}

  start(): void {
    if (this.task || this.failed) return;
    this.cancelRequested = false;
    this.task = this.renderRemaining()
      .catch((error: unknown) => {
        this.failed = true;
        console.error('❌ PAGE_PREVIEWS: Rendering stopped:', error);
      })
      .finally(() => {
        this.task = null;
      });
  }

  async stop(): Promise<void> {
    if (!this.task) return;
    this.cancelRequested = true;
    await this.task;
  }

  isRendering(): boolean {
    return this.task !== null;
  }

  getPreviews(): PagePreview[] {
    return [...this.previews];
  }

  private async renderRemaining(): Promise<void> {
    if (!this.document) {
      this.document = await PDFDocument.load(this.source.slice(), { updateMetadata: false });
    }
    const pages = this.document.getPages();

    for (let pageIndex = this.previews.length; pageIndex < pages.length; pageIndex++) {
      await nextTurn();
      if (this.cancelRequested) return;

      // Previews show the visible area of the page
      const { width, height } = pages[pageIndex].getCropBox();
      this.previews.push({
        pageIndex,
        width: Math.max(1, Math.round(width * this.scale)),
        height: Math.max(1, Math.round(height * this.scale)),
        scale: this.scale,
      });
    }
    console.log(`✅ PAGE_PREVIEWS: ${pages.length} previews ready`);
  }
}
