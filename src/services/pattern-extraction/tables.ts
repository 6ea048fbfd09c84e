import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { z } from 'zod';
import { logger } from '../../infrastructure/logger.js';

const DEFAULT_DATA_DIR = fileURLToPath(new URL('../../../data/', import.meta.url));
const MAX_WORK_TERMS = 10;

const log = logger.child({ module: 'extraction-tables' });

const issuerTableSchema = z.array(
  z.object({
    name: z.string().min(1),
    patterns: z.array(z.string().min(1)).min(1),
  }),
);

const serviceTermTableSchema = z.array(
  z.object({
    term: z.string().min(1),
    pattern: z.string().min(1),
  }),
);

export interface IssuerEntry {
  name: string;
  patterns: RegExp[];
}

export interface ServiceTermEntry {
  term: string;
  pattern: RegExp;
}

export interface ExtractionTables {
  issuers: IssuerEntry[];
  serviceTerms: ServiceTermEntry[];
  maxWorkTerms: number;
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

/**
 * Reads `issuers.json` and `service-terms.json` from `dataDir`.
 * Throws on a missing file or an entry that does not compile.
 */
export function loadExtractionTables(dataDir: string = DEFAULT_DATA_DIR): ExtractionTables {
  const issuers = issuerTableSchema.parse(readJson(join(dataDir, 'issuers.json')));
  const serviceTerms = serviceTermTableSchema.parse(readJson(join(dataDir, 'service-terms.json')));

  log.debug({ dataDir, issuers: issuers.length, serviceTerms: serviceTerms.length }, 'Loaded extraction tables');

  return {
    issuers: issuers.map((entry) => ({
      name: entry.name,
      patterns: entry.patterns.map((source) => new RegExp(source, 'i')),
    })),
    serviceTerms: serviceTerms.map((entry) => ({
      term: entry.term,
      pattern: new RegExp(entry.pattern, 'i'),
    })),
    maxWorkTerms: MAX_WORK_TERMS,
  };
}

let defaultTables: ExtractionTables | null = null;

export function getDefaultTables(): ExtractionTables {
  if (!defaultTables) {
    defaultTables = loadExtractionTables();
  }
  return defaultTables;
}
