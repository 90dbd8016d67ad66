import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs } from './cliOptions.js';

describe('parseCliArgs', () => {
  it('collects inputs with default flags', () => {
    expect(parseCliArgs(['./inbox', 'bill.pdf'])).toEqual({
      inputs: ['./inbox', 'bill.pdf'],
      assumeYes: false,
      dryRun: false,
      help: false,
    });
  });

  it('reads flags and valued options in both forms', () => {
    const options = parseCliArgs(['-y', '--dry-run', '--pages=1', '--mode', 'short-code', '--company-codes', 'codes.json', 'in']);
    expect(options).toEqual({
      inputs: ['in'],
      assumeYes: true,
      dryRun: true,
      help: false,
      maxPages: 1,
      namingMode: 'short-code',
      companyCodesFile: 'codes.json',
    });
  });

  it('treats everything after -- as an input', () => {
    expect(parseCliArgs(['--', '--yes.pdf']).inputs).toEqual(['--yes.pdf']);
  });

  it('recognizes help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--force'])).toThrow(new CliUsageError('Unknown option: --force'));
  });

  it('rejects invalid values', () => {
    expect(() => parseCliArgs(['--pages=3'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--mode=fancy'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--pages'])).toThrow('--pages needs a value');
  });
});
