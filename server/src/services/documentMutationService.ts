import { fork, type ChildProcess } from 'child_process';
import { fileURLToPath } from 'url';
import { DocumentMutationError, errorMessage } from '../errors';
import { isMutationReport, type MutationReport, type MutationRequest, type ShapeDescriptor } from '../types';
import { writeMutationLog } from './mutationLog';

const DEFAULT_WORKER_PATH = fileURLToPath(new URL('../workers/documentMutationWorker.ts', import.meta.url));

type WorkerOutcome = { ok: true } | { ok: false; reason: string; report?: MutationReport };

export interface DocumentMutationOptions {
  logDir: string;
  /** 0 waits for the worker however long it takes */
  timeoutMs: number;
  workerPath?: string;
  /** Node flags for the worker; the default loads TypeScript through tsx */
  execArgv?: string[];
}

/**
 * Runs each document mutation in a forked worker process. The caller waits
 * for the worker to exit; its exit code decides the outcome.
 */
export class DocumentMutationService {
  private readonly workerPath: string;
  private readonly execArgv: string[];

  constructor(private readonly options: DocumentMutationOptions) {
    this.workerPath = options.workerPath ?? DEFAULT_WORKER_PATH;
    this.execArgv = options.execArgv ?? ['--import', 'tsx'];
  }

  /**
   * Write `shapes` into a copy of `originalBytes` at `destinationPath`.
   * Resolves with the destination on success. Rejects with a
   * DocumentMutationError, leaving the destination unchanged, otherwise.
   */
  async mutate(originalBytes: Uint8Array, shapes: ShapeDescriptor[], destinationPath: string): Promise<string> {
    const request: MutationRequest = {
      originalBytes,
      shapes,
      destinationPath,
      logDir: this.options.logDir,
    };

    console.log(`🔄 DOCUMENT_MUTATION: Writing ${shapes.length} shapes to ${destinationPath}`);
    const outcome = await this.runWorker(request);

    if (outcome.ok) {
      console.log(`✅ DOCUMENT_MUTATION: Saved ${destinationPath}`);
      return destinationPath;
    }

    const logPath = outcome.report?.type === 'failed' && outcome.report.logPath
      ? outcome.report.logPath
      : await this.logFailure(outcome.reason);
    console.error(`❌ DOCUMENT_MUTATION: ${outcome.reason} (log: ${logPath || 'unavailable'})`);
    throw new DocumentMutationError(outcome.reason, logPath || undefined, { destinationPath });
  }

  private runWorker(request: MutationRequest): Promise<WorkerOutcome> {
    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = fork(this.workerPath, [], {
          execArgv: this.execArgv,
          serialization: 'advanced',
          stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
        });
      } catch (error) {
        resolve({ ok: false, reason: `Could not launch mutation worker: ${errorMessage(error)}` });
        return;
      }

      let report: MutationReport | undefined;
      let timedOut = false;
      let settled = false;

      const timeoutMs = this.options.timeoutMs;
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              child.kill('SIGKILL');
            }, timeoutMs)
          : undefined;

      const settle = (result: WorkerOutcome) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      child.on('message', (message: unknown) => {
        if (isMutationReport(message)) {
          report = message;
        }
      });

      child.once('error', (error) => {
        child.kill('SIGKILL');
        settle({ ok: false, reason: `Mutation worker failed: ${error.message}`, report });
      });

      child.once('exit', (code, signal) => {
        if (timedOut) {
          settle({ ok: false, reason: `Mutation worker timed out after ${timeoutMs} ms` });
        } else if (code === 0) {
          settle({ ok: true });
        } else if (report?.type === 'failed') {
          settle({ ok: false, reason: report.message, report });
        } else {
          settle({ ok: false, reason: `Mutation worker exited with ${signal ?? `code ${code}`}`, report });
        }
      });

      child.send(request, (error) => {
        if (error) {
          console.error('❌ DOCUMENT_MUTATION: Could not hand the request to the worker:', error);
          child.kill('SIGKILL');
        }
      });
    });
  }

  private async logFailure(reason: string): Promise<string> {
    try {
      return await writeMutationLog(this.options.logDir, reason);
    } catch (error) {
      console.error('❌ DOCUMENT_MUTATION: Could not write diagnostic log:', error);
      return '';
    }
  }
}
