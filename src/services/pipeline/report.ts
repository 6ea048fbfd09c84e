import type { ValidationOutcome } from '../../domain/types.js';
import type { BatchReport, DocumentReport } from './types.js';

/** `passed` counts clean passes only; warnings are reported separately. */
export function summarize(documents: DocumentReport[]): BatchReport {
  return {
    total: documents.length,
    passed: documents.filter((doc) => doc.status === 'pass').length,
    warnings: documents.filter((doc) => doc.status === 'warning').length,
    failed: documents.filter((doc) => doc.status === 'fail').length,
    fatal: documents.filter((doc) => doc.status === 'fatal').length,
    documents,
  };
}

function outcomeIssues(validation: ValidationOutcome | null | undefined, prefix = ''): string[] {
  if (!validation) return [];
  return [
    ...validation.missingRequired.map((field) => `${prefix}missing required ${field}`),
    ...validation.missingWarning.map((field) => `${prefix}missing ${field}`),
    ...validation.mismatches.map((mismatch) => `${prefix}${mismatch.message}`),
    ...validation.rangeViolations.map((violation) => `${prefix}${violation.message}`),
  ];
}

function issuesOf(doc: DocumentReport): string[] {
  const stages = Object.entries(doc.stages ?? {}).flatMap(([stage, outcome]) =>
    outcomeIssues(outcome, `${stage}: `),
  );
  return [
    ...outcomeIssues(doc.validation),
    ...stages,
    ...(doc.error ? [`${doc.error.code}: ${doc.error.message}`] : []),
  ];
}

/** One line per document, then a totals line. */
export function formatReport(report: BatchReport): string[] {
  const lines = report.documents.map((doc) => {
    const issues = issuesOf(doc);
    const suffix = issues.length > 0 ? `  (${issues.join('; ')})` : '';
    return `${doc.status.toUpperCase().padEnd(8)} ${doc.documentId}${suffix}`;
  });
  lines.push(
    `Total ${report.total}: ${report.passed} passed, ${report.warnings} warnings, ${report.failed} failed, ${report.fatal} fatal`,
  );
  return lines;
}
