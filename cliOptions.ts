import type { NamingMode } from './types.js';

export interface CliOptions {
  inputs: string[];
  assumeYes: boolean;
  dryRun: boolean;
  help: boolean;
  maxPages?: number;
  namingMode?: NamingMode;
  companyCodesFile?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `
Usage:
  npx tsx cli.ts <folder|file.pdf>... [options]

Options:
  -y, --yes                 rename without asking for confirmation
      --dry-run             only show the proposed names
      --pages=N             pages to read per document (1 or 2)
      --mode=MODE           naming mode: positional (default) or short-code
      --company-codes=FILE  JSON table of company name -> short code
  -h, --help                show this help
`;

const parsePages = (value: string): number => {
  const pages = Number(value);
  if (!Number.isInteger(pages) || pages < 1 || pages > 2) {
    throw new CliUsageError(`--pages must be 1 or 2 (got "${value}")`);
  }
  return pages;
};

const parseMode = (value: string): NamingMode => {
  if (value === 'positional' || value === 'short-code') return value;
  throw new CliUsageError(`--mode must be "positional" or "short-code" (got "${value}")`);
};

/**
 * Parses `process.argv.slice(2)`. Options take their value as `--name=value`
 * or as the following argument; `--` ends option parsing.
 */
export const parseCliArgs = (args: readonly string[]): CliOptions => {
  const options: CliOptions = { inputs: [], assumeYes: false, dryRun: false, help: false };
  let onlyInputs = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (onlyInputs || !arg.startsWith('-') || arg === '-') {
      options.inputs.push(arg);
      continue;
    }
    if (arg === '--') {
      onlyInputs = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const takeValue = (): string => {
      if (eq !== -1) return arg.slice(eq + 1);
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new CliUsageError(`${name} needs a value`);
      }
      i++;
      return next;
    };

    switch (name) {
      case '-y':
      case '--yes':
        options.assumeYes = true;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--pages':
        options.maxPages = parsePages(takeValue());
        break;
      case '--mode':
        options.namingMode = parseMode(takeValue());
        break;
      case '--company-codes':
        options.companyCodesFile = takeValue();
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
};
