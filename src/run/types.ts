/**
 * Verdict and run report records
 * snake_case because both are serialized as they are.
 */

import type { EntityClassification } from '@/entity/capability_gate';
import type { ModuleOutcomeStatus, PhaseStatus } from '@/pipeline/types';
import type { SafetyCheck } from '@/safety/kill_switch';
import type { UnavailableReason } from '@/signals/envelope';
import type { Confidence, FinalRating, Rating } from '@/synthesis/consensus';
import type { Vote } from '@/synthesis/votes';
import type { AuditFlag, AuditOpinion } from '@/validation/auditor';
import type { TrustBand, TrustRecord } from '@/validation/cross_source';

export const REPORT_VERSION = '1.0.0';

export interface VoteCounts {
  registered: number;
  available: number;
  unavailable: number;
  positive: number;
  neutral: number;
  negative: number;
}

export interface Verdict {
  symbol: string;
  as_of: string;
  rating: FinalRating;
  candidate_rating: Rating | null;
  positive_fraction: number | null;
  trust_score: number;
  trust_band: TrustBand;
  confidence: Confidence;
  votes: VoteCounts;
  veto_reason: string | null;
  vetoes: SafetyCheck[];
}

export interface ReportProfile {
  classification: EntityClassification;
  classification_basis: string;
  sector: string | null;
  fiscal_years: string[];
}

export interface ReportOutput {
  name: string;
  available: boolean;
  value: unknown;
  unit: string | null;
  source_id: string;
  confidence: number | null;
  reason: UnavailableReason | null;
  detail: string | null;
}

export interface ReportModule {
  module_id: string;
  status: ModuleOutcomeStatus;
  error: string | null;
}

export interface ReportPhase {
  phase_id: string;
  status: PhaseStatus;
  errors: string[];
  modules: ReportModule[];
  outputs: ReportOutput[];
}

export interface ReportTrust {
  score: number;
  band: TrustBand;
  records: TrustRecord[];
  excluded: string[];
  audit_opinion: AuditOpinion | null;
  going_concern: boolean | null;
  audit_flags: AuditFlag[];
}

export interface RunReport {
  report_version: string;
  run_id: string;
  symbol: string;
  as_of: string;
  config_version: string;
  /** Hash of the seed envelopes the run started from */
  input_fingerprint: string;
  profile: ReportProfile;
  verdict: Verdict;
  votes: Vote[];
  phases: ReportPhase[];
  trust: ReportTrust;
  safety: { checks: SafetyCheck[] };
  /** Hash of everything above except run_id */
  fingerprint: string;
}
