import * as fs from 'fs';
import { z } from 'zod';
import type { NamingConfig, NamingMode } from './types.js';

export const COMPANY_SHORT_CODES: Record<string, string> = {
  "AQ PACK (M) SDN BHD": "AQP",
  "AQ PACK (PENANG) SDN BHD": "AQPP",
  "TENAGA NASIONAL": "TNB",
  "MAXIS": "MAXIS"
};

export const POSITIONAL_NAMING: Readonly<NamingConfig> = Object.freeze({
  companyStrategy: 'positional',
  uppercase: false,
  substitute: '-',
  minLineLength: 3,
  companyScanLines: 30,
  descriptionScanLines: 60,
  minCompanyLetters: 6,
  minDescriptionLength: 6,
  maxCompanyLength: 60,
  maxDescriptionLength: 80,
  placeholderName: 'DOCUMENT',
  unknownCompany: 'UNKNOWN',
  companyCodes: Object.freeze({ ...COMPANY_SHORT_CODES }),
});

export const SHORT_CODE_NAMING: Readonly<NamingConfig> = Object.freeze({
  ...POSITIONAL_NAMING,
  companyStrategy: 'lookup',
  uppercase: true,
  substitute: ' ',
  maxCompanyLength: 20,
  maxDescriptionLength: 60,
});

const companyCodesSchema = z.record(z.string().trim().min(1), z.string().trim().min(1));

const namingOverridesSchema = z
  .object({
    companyStrategy: z.enum(['positional', 'lookup']),
    uppercase: z.boolean(),
    // A substitute must not itself be a reserved character
    substitute: z.string().max(1).regex(/^[^\\/:*?"<>|]*$/),
    minLineLength: z.number().int().min(1),
    companyScanLines: z.number().int().min(1),
    descriptionScanLines: z.number().int().min(1),
    minCompanyLetters: z.number().int().min(1),
    minDescriptionLength: z.number().int().min(1),
    maxCompanyLength: z.number().int().min(1),
    maxDescriptionLength: z.number().int().min(1),
    placeholderName: z.string().trim().min(1).regex(/^[^\\/:*?"<>|]+$/),
    unknownCompany: z.string().trim().min(1).regex(/^[^\\/:*?"<>|]+$/),
    companyCodes: companyCodesSchema,
  })
  .partial()
  .strict();

export type NamingOverrides = z.input<typeof namingOverridesSchema>;

/**
 * Builds a frozen naming configuration from a preset and validated overrides.
 * Throws a ZodError when an override is out of range.
 */
export const createNamingConfig = (
  overrides: NamingOverrides = {},
  base: Readonly<NamingConfig> = POSITIONAL_NAMING
): Readonly<NamingConfig> => {
  const parsed = namingOverridesSchema.parse(overrides);
  return Object.freeze({
    ...base,
    ...parsed,
    companyCodes: Object.freeze({ ...(parsed.companyCodes ?? base.companyCodes) }),
  });
};

/** Reads a company-code table (JSON object of company name → short code). */
export const loadCompanyCodes = (filePath: string): Record<string, string> => {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return companyCodesSchema.parse(raw);
};

const settingsSchema = z.object({
  maxPages: z.coerce.number().int().min(1).max(2).default(2),
  minTextLength: z.coerce.number().int().min(0).default(50),
  renderScale: z.coerce.number().positive().max(8).default(2),
  namingMode: z.enum(['positional', 'short-code']).default('positional'),
  companyCodesFile: z.string().min(1).optional(),
  tesseractLangPath: z.string().min(1).optional(),
});

export type AppSettings = z.input<typeof settingsSchema>;

export interface OcrSettings {
  language: string;
  langPath?: string;
}

export interface AppConfig {
  maxPages: number;
  minTextLength: number;
  renderScale: number;
  namingMode: NamingMode;
  naming: Readonly<NamingConfig>;
  ocr: OcrSettings;
}

const OCR_LANGUAGE = 'eng';

const settingsFromEnv = (env: NodeJS.ProcessEnv): Record<string, string | undefined> => ({
  maxPages: env.RENAMER_MAX_PAGES || undefined,
  minTextLength: env.RENAMER_MIN_TEXT_LENGTH || undefined,
  renderScale: env.RENAMER_RENDER_SCALE || undefined,
  namingMode: env.RENAMER_NAMING_MODE || undefined,
  companyCodesFile: env.RENAMER_COMPANY_CODES_FILE || undefined,
  tesseractLangPath: env.TESSERACT_LANG_PATH || undefined,
});

/**
 * Resolves application settings from the environment, with command-line
 * overrides taking precedence over environment values.
 */
export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env, overrides: AppSettings = {}): AppConfig => {
  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const settings = settingsSchema.parse({ ...settingsFromEnv(env), ...definedOverrides });

  const preset = settings.namingMode === 'short-code' ? SHORT_CODE_NAMING : POSITIONAL_NAMING;
  const naming = settings.companyCodesFile
    ? createNamingConfig({ companyCodes: loadCompanyCodes(settings.companyCodesFile) }, preset)
    : preset;

  return {
    maxPages: settings.maxPages,
    minTextLength: settings.minTextLength,
    renderScale: settings.renderScale,
    namingMode: settings.namingMode,
    naming,
    ocr: {
      language: OCR_LANGUAGE,
      langPath: settings.tesseractLangPath,
    },
  };
};
