// ============================================================================
// Risk & Language
// ============================================================================

export const RISK_LEVELS = ['low', 'medium', 'high', 'critical'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const SUPPORTED_LANGUAGES = ['en', 'hi', 'mr', 'gu', 'bn', 'ta', 'te', 'kn', 'ml', 'pa'] as const;
export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export type EscalationTrigger =
  | 'emergency_keywords'
  | 'dangerous_medication_combination'
  | 'high_risk_low_confidence'
  | 'dangerous_advice_pattern'
  | 'condition_low_confidence'
  | 'very_low_confidence'
  | 'contradictions_detected'
  | 'low_accuracy_response'
  | 'validation_error';

// ============================================================================
// Knowledge Base Types
// ============================================================================

export type FactType = 'symptom' | 'treatment' | 'prevention';

export interface MedicalSource {
  id: number;
  name: string;
  sourceType: string;
  authorityLevel: number;
  url: string | null;
  description: string | null;
  isActive: boolean;
}

export interface MedicalCondition {
  id: number;
  name: string;
  icd10Code: string | null;
  description: string | null;
  aliases: string[];
  symptoms: string[];
  treatments: string[];
  contraindications: string[];
  warningSigns: string[];
}

export interface MedicalFact {
  id: number;
  conditionId: number;
  sourceId: number;
  factType: FactType;
  factText: string;
  confidenceScore: number | null;
}

/** A fact joined with the authority level of the source that states it. */
export interface SourcedFact extends MedicalFact {
  sourceName: string;
  authorityLevel: number;
}

// ============================================================================
// Claim & Fact-Check Types
// ============================================================================

export const CLAIM_TYPES = [
  'symptom',
  'treatment',
  'prevention',
  'warning',
  'emergency',
  'diagnosis',
  'general_info',
] as const;
export type ClaimType = (typeof CLAIM_TYPES)[number];

export interface ExtractedClaim {
  text: string;
  type: ClaimType;
  testable: boolean;
  confidence: number;
}

export type FactCheckStatus = 'verified' | 'contradicted' | 'concerning' | 'unverifiable';

export interface FactMatch {
  factId: number;
  conditionId: number;
  factText: string;
  sourceName: string;
  authorityLevel: number;
  confidence: number;
}

export interface FactCheckResult {
  claim: string;
  claimType: ClaimType;
  status: FactCheckStatus;
  confidence: number;
  matchedFactIds: number[];
  sources: string[];
  details: string;
}

export interface SemanticScores {
  semanticConfidence: number;
  completeness: number;
  accuracy: number;
  appropriateness: number;
}

export interface SemanticReport {
  claims: ExtractedClaim[];
  factChecks: FactCheckResult[];
  metrics: {
    totalClaims: number;
    verifiedClaims: number;
    contradictedClaims: number;
    unverifiableClaims: number;
    concerningClaims: number;
  };
  scores: SemanticScores;
  risk: Exclude<RiskLevel, 'critical'>;
  triggers: string[];
  requiresEscalation: boolean;
  sourcesUsed: string[];
  durationMs: number;
}

// ============================================================================
// Validation Result
// ============================================================================

export interface ValidationScores {
  accuracy: number | null;
  appropriateness: number | null;
  semanticConfidence: number | null;
}

export interface ValidationResult {
  riskLevel: RiskLevel;
  confidenceScore: number;
  requiresEscalation: boolean;
  escalationTrigger: EscalationTrigger | null;
  validationMessage: string;
  emergencyKeywordsDetected: string[];
  highRiskKeywordsDetected: string[];
  dangerousPatternsDetected: string[];
  verifiedClaims: string[];
  contradictedClaims: string[];
  sourcesUsed: string[];
  scores: ValidationScores;
  semanticRan: boolean;
}

// ============================================================================
// Escalation Types
// ============================================================================

export const CASE_STATUSES = ['open', 'in_progress', 'resolved', 'closed'] as const;
export type CaseStatus = (typeof CASE_STATUSES)[number];

export interface Expert {
  id: number;
  name: string;
  phone: string | null;
  specialization: string | null;
  isActive: boolean;
  isAvailable: boolean;
}

export interface EscalatedCase {
  id: number;
  userId: string;
  validationId: number | null;
  assignedExpertId: number | null;
  originalQuery: string;
  botResponse: string;
  severity: RiskLevel;
  escalationReason: string;
  keywordsTriggered: string[];
  status: CaseStatus;
  resolutionNotes: string | null;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt: Date | null;
}

// ============================================================================
// Disclaimer Types
// ============================================================================

export interface Disclaimer {
  id: number;
  riskLevel: RiskLevel;
  language: Language;
  content: string;
  priority: number;
  isActive: boolean;
  isDefault: boolean;
  createdAt: Date;
}

export interface DisclaimerTracking {
  id: number;
  userId: string;
  disclaimerId: number;
  messageId: string | null;
  context: Record<string, unknown>;
  shownAt: Date;
}

// ============================================================================
// Audit Types
// ============================================================================

export interface ResponseValidationRecord extends ValidationResult {
  id: number;
  userId: string;
  messageId: string | null;
  userQuery: string;
  botResponse: string;
  escalationId: number | null;
  escalationError: string | null;
  createdAt: Date;
}

// ============================================================================
// Job Types
// ============================================================================

export interface ExpertNotificationJobData {
  type: 'expert_notification';
  correlationId: string;
  caseId: number;
  expertId: number;
  expertPhone: string;
  severity: RiskLevel;
  reason: string;
  originalQuery: string;
}

export interface JobResult {
  status: 'completed' | 'failed' | 'skipped';
  correlationId: string;
  action?: string;
  error?: string;
}
