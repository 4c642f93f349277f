/**
 * Isolated document mutation worker. Receives exactly one request over IPC,
 * writes the annotated document next to the destination and renames it over
 * the destination. Exit code 0 means the destination was replaced; any other
 * exit leaves it untouched.
 */
import os from 'os';
import fs from 'fs-extra';
import { annotateDocument } from '../services/annotationWriter';
import { writeMutationLog } from '../services/mutationLog';
import { isMutationRequest, type MutationReport, type MutationRequest } from '../types';

const report = (message: MutationReport): Promise<void> =>
  new Promise((resolve) => {
    if (!process.send) {
      resolve();
      return;
    }
    process.send(message, undefined, {}, () => resolve());
  });

async function writeAtomically(destinationPath: string, bytes: Uint8Array): Promise<void> {
  const tempPath = `${destinationPath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, bytes);
    await fs.move(tempPath, destinationPath, { overwrite: true });
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }
}

async function run(request: MutationRequest): Promise<void> {
  const bytes = await annotateDocument(request.originalBytes, request.shapes);
  await writeAtomically(request.destinationPath, bytes);
}

async function handleFailure(error: unknown, logDir: string): Promise<void> {
  const details = error instanceof Error ? (error.stack ?? error.message) : String(error);
  let logPath = '';
  try {
    logPath = await writeMutationLog(logDir, details);
  } catch (logError) {
    console.error('❌ MUTATION_WORKER: Could not write diagnostic log:', logError);
  }
  await report({ type: 'failed', message: error instanceof Error ? error.message : String(error), logPath });
}

process.once('message', async (message: unknown) => {
  const logDir = isMutationRequest(message) ? message.logDir : os.tmpdir();
  try {
    if (!isMutationRequest(message)) {
      throw new Error('Malformed mutation request');
    }
    await run(message);
    await report({ type: 'done', path: message.destinationPath });
    process.exit(0);
  } catch (error) {
    await handleFailure(error, logDir);
    process.exit(1);
  }
});

// The requesting process went away before sending anything
process.once('disconnect', () => {
  process.exit(1);
});
