/**
 * Auditor observation severity
 * Pure keyword classification of the observations quoted in an audit report.
 */

export type AuditSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface AuditFlag {
  observation: string;
  severity: AuditSeverity;
  matched: string | null;
}

// First match wins, so the more specific phrases come first.
const SEVERITY_RULES: ReadonlyArray<{ pattern: RegExp; label: string; severity: AuditSeverity }> = [
  { pattern: /going concern/, label: 'going concern', severity: 'CRITICAL' },
  { pattern: /adverse/, label: 'adverse', severity: 'CRITICAL' },
  { pattern: /disclaimer/, label: 'disclaimer', severity: 'CRITICAL' },
  { pattern: /key audit matter/, label: 'key audit matter', severity: 'LOW' },
  { pattern: /qualifi/, label: 'qualified', severity: 'HIGH' },
  { pattern: /except for/, label: 'except for', severity: 'HIGH' },
  { pattern: /material weakness|material misstatement/, label: 'material', severity: 'HIGH' },
  { pattern: /departure/, label: 'departure', severity: 'HIGH' },
  { pattern: /non-?compliance/, label: 'non-compliance', severity: 'HIGH' },
  { pattern: /emphasis of matter|emphasis/, label: 'emphasis of matter', severity: 'MEDIUM' },
];

const SEVERITY_RANK: Record<AuditSeverity, number> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

/**
 * Observations that match no rule are MEDIUM.
 */
export function classifyObservation(observation: string): AuditFlag {
  const text = observation.toLowerCase();
  for (const rule of SEVERITY_RULES) {
    if (rule.pattern.test(text)) {
      return { observation, severity: rule.severity, matched: rule.label };
    }
  }
  return { observation, severity: 'MEDIUM', matched: null };
}

export function classifyObservations(observations: readonly string[]): AuditFlag[] {
  return observations
    .map((o) => o.trim())
    .filter((o) => o.length > 0)
    .map(classifyObservation);
}

export function isAtLeast(severity: AuditSeverity, threshold: AuditSeverity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

export type AuditOpinion = 'unmodified' | 'qualified' | 'adverse' | 'disclaimer';

const MODIFIED_OPINIONS: readonly AuditOpinion[] = ['qualified', 'adverse', 'disclaimer'];

export function parseAuditOpinion(text: string): AuditOpinion | null {
  const normalized = text.trim().toLowerCase();
  if (normalized === 'unmodified' || normalized === 'unqualified' || normalized === 'clean') {
    return 'unmodified';
  }
  if (normalized.startsWith('qualified')) return 'qualified';
  if (normalized.startsWith('adverse')) return 'adverse';
  if (normalized.startsWith('disclaimer')) return 'disclaimer';
  return null;
}

export function isModifiedOpinion(opinion: AuditOpinion): boolean {
  return MODIFIED_OPINIONS.includes(opinion);
}
