import path from 'path';
import fs from 'fs-extra';

/**
 * Append a diagnostic record for a failed document mutation.
 * Returns the log file path.
 */
export async function writeMutationLog(logDir: string, details: string): Promise<string> {
  await fs.ensureDir(logDir);
  const stamp = new Date().toISOString().replace(/[:.]/g, '-');
  const logPath = path.join(logDir, `document-mutation-${stamp}.log`);
  await fs.appendFile(logPath, `[${new Date().toISOString()}]\n${details}\n\n`);
  return logPath;
}
