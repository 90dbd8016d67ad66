import * as fs from 'fs';
import * as path from 'path';
import { logger } from './logger.js';
import { NameHeuristics } from './nameHeuristics.js';
import { DEFAULT_MAX_PAGES, type TextAcquirer, textOf } from './textAcquisition.js';
import type { RenameCandidate, RenameOutcome, RenameSummary } from './types.js';

const PDF_EXTENSION = /\.pdf$/i;

/** PDFs directly inside `folder`, sorted by name. */
export const listPdfFiles = (folder: string): string[] =>
  fs
    .readdirSync(folder, { withFileTypes: true })
    .filter(entry => entry.isFile() && PDF_EXTENSION.test(entry.name))
    .map(entry => entry.name)
    .sort()
    .map(name => path.join(folder, name));

export interface InputFiles {
  files: string[];
  skipped: { input: string; reason: string }[];
}

/**
 * Expands folders into their PDFs and keeps PDF paths in the order given.
 * Duplicates are dropped; missing paths and non-PDF files are reported.
 */
export const collectInputFiles = (inputs: readonly string[]): InputFiles => {
  const files: string[] = [];
  const skipped: InputFiles['skipped'] = [];
  const seen = new Set<string>();

  const add = (filePath: string) => {
    const key = path.resolve(filePath);
    if (seen.has(key)) return;
    seen.add(key);
    files.push(filePath);
  };

  for (const input of inputs) {
    if (!fs.existsSync(input)) {
      skipped.push({ input, reason: 'not found' });
      continue;
    }
    const stats = fs.statSync(input);
    if (stats.isDirectory()) {
      listPdfFiles(input).forEach(add);
    } else if (stats.isFile() && PDF_EXTENSION.test(input)) {
      add(input);
    } else {
      skipped.push({ input, reason: 'not a PDF file' });
    }
  }

  return { files, skipped };
};

export interface RenameProposerOptions {
  acquirer: TextAcquirer;
  heuristics?: NameHeuristics;
  maxPages?: number;
}

/**
 * Runs the acquisition + naming pipeline for one document.
 */
export class RenameProposer {
  private readonly acquirer: TextAcquirer;
  private readonly heuristics: NameHeuristics;
  private readonly maxPages: number;

  constructor(options: RenameProposerOptions) {
    this.acquirer = options.acquirer;
    this.heuristics = options.heuristics ?? new NameHeuristics();
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  async propose(sourcePath: string): Promise<RenameCandidate> {
    const originalName = path.basename(sourcePath);
    const extension = path.extname(originalName);
    const fallbackBase = path.basename(originalName, extension);

    const acquired = await this.acquirer.acquire(sourcePath, this.maxPages);
    const proposedName = this.heuristics.proposeName(textOf(acquired), fallbackBase, extension);

    return {
      sourcePath,
      originalName,
      proposedName,
      textSource: acquired.status === 'text' ? acquired.source : 'fallback',
    };
  }
}

/**
 * Proposes a name for each document, strictly one after another and in the
 * order given. `onCandidate` sees each proposal as soon as it is ready.
 */
export const scanDocuments = async (
  filePaths: readonly string[],
  proposer: RenameProposer,
  onCandidate?: (candidate: RenameCandidate) => void
): Promise<RenameCandidate[]> => {
  const candidates: RenameCandidate[] = [];
  for (const filePath of filePaths) {
    const candidate = await proposer.propose(filePath);
    candidates.push(candidate);
    onCandidate?.(candidate);
  }
  return candidates;
};

const renameOne = (candidate: RenameCandidate): RenameOutcome => {
  const targetPath = path.join(path.dirname(candidate.sourcePath), candidate.proposedName);
  const outcome = (status: RenameOutcome['status'], error: string | null = null): RenameOutcome => ({
    candidate,
    status,
    targetPath,
    error,
  });

  if (path.resolve(targetPath) === path.resolve(candidate.sourcePath)) {
    return outcome('skipped-same');
  }
  if (fs.existsSync(targetPath)) {
    return outcome('skipped-exists');
  }

  try {
    fs.renameSync(candidate.sourcePath, targetPath);
    return outcome('renamed');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error, source: candidate.sourcePath, target: targetPath }, 'rename failed');
    return outcome('failed', message);
  }
};

/**
 * Renames each candidate inside its own folder. Never overwrites: a target
 * that exists, or equals the source, is skipped. One failure does not stop
 * the batch.
 */
export const applyRenames = (candidates: readonly RenameCandidate[]): RenameSummary => {
  const outcomes = candidates.map(renameOne);
  return {
    renamed: outcomes.filter(o => o.status === 'renamed').length,
    skipped: outcomes.filter(o => o.status === 'skipped-same' || o.status === 'skipped-exists').length,
    failed: outcomes.filter(o => o.status === 'failed').length,
    outcomes,
  };
};
