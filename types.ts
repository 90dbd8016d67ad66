export type CompanyStrategy = 'positional' | 'lookup';

export type NamingMode = 'positional' | 'short-code';

export interface NamingConfig {
  companyStrategy: CompanyStrategy;
  uppercase: boolean;
  substitute: string; // replaces each run of reserved filename characters
  minLineLength: number;
  companyScanLines: number;
  descriptionScanLines: number;
  minCompanyLetters: number;
  minDescriptionLength: number;
  maxCompanyLength: number;
  maxDescriptionLength: number;
  placeholderName: string;
  unknownCompany: string;
  companyCodes: Readonly<Record<string, string>>;
}

export type AcquisitionSource = 'direct' | 'ocr';

export type AcquiredText =
  | { status: 'text'; source: AcquisitionSource; text: string }
  | { status: 'empty'; source: AcquisitionSource }
  | { status: 'unreadable'; source: AcquisitionSource; reason: string };

/** Usable lines of a document, in page order. */
export type ExtractedText = readonly string[];

export interface CompanyMatch {
  name: string;
  sourceLine?: string; // line the name was derived from, skipped by description detection
}

export interface RenameCandidate {
  sourcePath: string;
  originalName: string;
  proposedName: string;
  textSource: AcquisitionSource | 'fallback';
}

export type RenameStatus = 'renamed' | 'skipped-same' | 'skipped-exists' | 'failed';

export interface RenameOutcome {
  candidate: RenameCandidate;
  status: RenameStatus;
  targetPath: string;
  error: string | null;
}

export interface RenameSummary {
  renamed: number;
  skipped: number;
  failed: number;
  outcomes: RenameOutcome[];
}
