import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { PDFDocument } from 'pdf-lib';
import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { DocumentMutationError } from '../errors';
import type { ShapeDescriptor } from '../types';
import { DocumentMutationService } from './documentMutationService';

const square: ShapeDescriptor = {
  kind: 'rectangle',
  pageIndex: 0,
  geometry: { x0: 100, y0: 100, x1: 200, y1: 150 },
  color: { r: 0, g: 1, b: 0 },
};

const rejectionOf = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the mutation to fail');
};

describe('DocumentMutationService', () => {
  let blankPdf: Uint8Array;
  let workDir: string;
  let logDir: string;

  beforeAll(async () => {
    const doc = await PDFDocument.create();
    doc.addPage([600, 800]);
    blankPdf = await doc.save();
  });

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mutation-test-'));
    logDir = path.join(workDir, 'logs');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(workDir);
  });

  it('writes the annotated document and leaves no temporary file', async () => {
    const service = new DocumentMutationService({ logDir, timeoutMs: 0 });
    const destination = path.join(workDir, 'plan.pdf');

    await expect(service.mutate(blankPdf, [square], destination)).resolves.toBe(destination);

    const saved = await PDFDocument.load(await fs.readFile(destination));
    expect(saved.getPage(0).node.Annots()?.size()).toBe(1);
    expect((await fs.readdir(workDir)).sort()).toEqual(['plan.pdf']);
  });

  it('leaves the destination byte-identical when the worker fails', async () => {
    const service = new DocumentMutationService({ logDir, timeoutMs: 0 });
    const destination = path.join(workDir, 'plan.pdf');
    await fs.writeFile(destination, 'previous contents');

    const error = await rejectionOf(service.mutate(new TextEncoder().encode('not a pdf'), [square], destination));

    expect(error).toBeInstanceOf(DocumentMutationError);
    expect(await fs.readFile(destination, 'utf8')).toBe('previous contents');
    expect((await fs.readdir(workDir)).sort()).toEqual(['logs', 'plan.pdf']);
  });

  it('records a diagnostic log for failures', async () => {
    const service = new DocumentMutationService({ logDir, timeoutMs: 0 });
    const destination = path.join(workDir, 'plan.pdf');

    const error = await rejectionOf(
      service.mutate(blankPdf, [{ ...square, pageIndex: 3 }], destination)
    );

    expect(error).toBeInstanceOf(DocumentMutationError);
    if (!(error instanceof DocumentMutationError) || !error.logPath) {
      throw new Error('Expected a log path');
    }
    expect(error.message).toBe('Page 3 does not exist (document has 1 pages)');
    expect(path.dirname(error.logPath)).toBe(logDir);
    expect(path.basename(error.logPath)).toMatch(/^document-mutation-.*\.log$/);
    expect(await fs.readFile(error.logPath, 'utf8')).toContain('Page 3 does not exist');
    expect(await fs.pathExists(destination)).toBe(false);
  });

  it('treats a timeout as a failure', async () => {
    const service = new DocumentMutationService({ logDir, timeoutMs: 1 });
    const destination = path.join(workDir, 'plan.pdf');

    const error = await rejectionOf(service.mutate(blankPdf, [square], destination));

    expect(error).toBeInstanceOf(DocumentMutationError);
    expect(error instanceof Error && error.message).toBe('Mutation worker timed out after 1 ms');
    expect(await fs.pathExists(destination)).toBe(false);
  });
});
