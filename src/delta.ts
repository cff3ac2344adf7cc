import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import type { InputFile, UnreadableInputFile } from './ingest/inputFiles';
import { orderInputFiles } from './ingest/inputFiles';
import type { ProcessedFileRecord } from './types';

export type FileClassification = 'NEW' | 'UNCHANGED' | 'MODIFIED';

export type PlannedAction = FileClassification | 'FORCED';

export interface ManifestLookup {
  lookup(filename: string): ProcessedFileRecord | null;
}

export interface PlannedFile {
  file: InputFile;
  contentHash: string;
  action: PlannedAction;
  previous: ProcessedFileRecord | null;
}

export function classify(manifest: ManifestLookup, filename: string, contentHash: string): FileClassification {
  const previous = manifest.lookup(filename);
  if (!previous) {
    return 'NEW';
  }
  return previous.contentHash === contentHash ? 'UNCHANGED' : 'MODIFIED';
}

export function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    const stream = createReadStream(filePath);
    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export interface BatchPlan {
  files: PlannedFile[];
  /** Files whose contents could not be hashed; they are left out of the plan. */
  unreadable: UnreadableInputFile[];
}

export type PlanBatchOptions = {
  /** Filename to reprocess regardless of the manifest. Only that file is planned. */
  forceFile?: string;
  hashFile?: (filePath: string) => Promise<string>;
};

/**
 * Orders the discovered files chronologically and classifies each against the
 * manifest. The returned order is the merge order.
 */
export async function planBatch(
  manifest: ManifestLookup,
  files: InputFile[],
  options: PlanBatchOptions = {}
): Promise<BatchPlan> {
  const hashFile = options.hashFile ?? computeFileHash;
  const ordered = orderInputFiles(files);
  const selected = options.forceFile
    ? ordered.filter((file) => file.filename === options.forceFile)
    : ordered;

  const plan: PlannedFile[] = [];
  const unreadable: UnreadableInputFile[] = [];
  for (const file of selected) {
    let contentHash: string;
    try {
      contentHash = await hashFile(file.path);
    } catch (error) {
      unreadable.push({ path: file.path, filename: file.filename, error });
      continue;
    }
    const previous = manifest.lookup(file.filename);
    const action: PlannedAction = options.forceFile ? 'FORCED' : classify(manifest, file.filename, contentHash);
    plan.push({ file, contentHash, action, previous });
  }
  return { files: plan, unreadable };
}
