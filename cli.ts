#!/usr/bin/env node
import 'dotenv/config'; // Load environment variables from .env
import * as path from 'path';
import { createInterface } from 'readline/promises';
import { CliUsageError, parseCliArgs, USAGE } from './cliOptions.js';
import { loadAppConfig, type AppConfig } from './config.js';
import { logger } from './logger.js';
import { NameHeuristics } from './nameHeuristics.js';
import { TesseractOcrEngine } from './ocrService.js';
import { applyRenames, collectInputFiles, RenameProposer, scanDocuments } from './renamer.js';
import { createTextAcquirer } from './textAcquisition.js';
import type { RenameCandidate } from './types.js';

// --- 1. REVIEW HELPERS ---

const printCandidate = (candidate: RenameCandidate) => {
  const via = candidate.textSource === 'ocr' ? '  (OCR)' : candidate.textSource === 'fallback' ? '  (no text)' : '';
  const marker = candidate.proposedName === candidate.originalName ? '=' : '→';
  console.log(`  ${candidate.originalName}  ${marker}  ${candidate.proposedName}${via}`);
};

const confirm = async (question: string): Promise<boolean> => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
};

const scan = async (files: string[], config: AppConfig): Promise<RenameCandidate[]> => {
  const engine = new TesseractOcrEngine(config.ocr);
  try {
    const proposer = new RenameProposer({
      acquirer: createTextAcquirer({
        engine,
        minTextLength: config.minTextLength,
        renderScale: config.renderScale,
      }),
      heuristics: new NameHeuristics(config.naming),
      maxPages: config.maxPages,
    });
    return await scanDocuments(files, proposer, printCandidate);
  } finally {
    await engine.terminate();
  }
};

// --- 2. MAIN CLI LOGIC ---

const main = async () => {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help || options.inputs.length === 0) {
    console.log(USAGE);
    return;
  }

  const config = loadAppConfig(process.env, {
    maxPages: options.maxPages,
    namingMode: options.namingMode,
    companyCodesFile: options.companyCodesFile,
  });

  const { files, skipped } = collectInputFiles(options.inputs);
  for (const { input, reason } of skipped) {
    console.warn(`⚠️  Skipping ${input}: ${reason}`);
  }
  if (files.length === 0) {
    console.log("No PDF files to scan.");
    return;
  }

  console.log(`🔄 Scanning ${files.length} PDF(s)...\n`);

  const candidates = await scan(files, config);

  const pending = candidates.filter(c => c.proposedName !== c.originalName);
  if (pending.length === 0) {
    console.log("\n✨ All names already match, nothing to rename.");
    return;
  }
  if (options.dryRun) {
    console.log(`\nDry run: ${pending.length} file(s) would be renamed.`);
    return;
  }
  if (!options.assumeYes && !(await confirm(`\nRename ${pending.length} file(s)? [y/N] `))) {
    console.log("Cancelled, no files renamed.");
    return;
  }

  const summary = applyRenames(pending);
  for (const outcome of summary.outcomes) {
    if (outcome.status === 'skipped-exists') {
      console.warn(`⚠️  ${outcome.candidate.originalName}: target exists (${path.basename(outcome.targetPath)})`);
    } else if (outcome.status === 'failed') {
      console.error(`❌ ${outcome.candidate.originalName}: ${outcome.error}`);
    }
  }

  console.log(`\n✅ Renamed: ${summary.renamed}  Skipped (same/exists): ${summary.skipped}  Errors: ${summary.failed}`);
};

// --- 3. ENTRY POINT ---

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(`❌ ${error.message}`);
    console.log(USAGE);
    process.exitCode = 2;
    return;
  }
  logger.fatal({ err: error }, 'renamer aborted');
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
