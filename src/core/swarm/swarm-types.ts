/**
 * Responder specialisations. Master is mandatory in every plan and produces the final verdict.
 */
export const ROLES = ['master', 'search', 'innovation', 'analysis'] as const;
export type Role = (typeof ROLES)[number];

export const OPTIONAL_ROLES: readonly Exclude<Role, 'master'>[] = ['search', 'innovation', 'analysis'];

export const COMPLEXITY_LEVELS = ['basic', 'intermediate', 'advanced', 'research'] as const;
export type ComplexityLevel = (typeof COMPLEXITY_LEVELS)[number];

export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export type ExecutionStrategy = 'sequential' | 'parallel' | 'hierarchical' | 'full_orchestration';

export type QueryType =
  | 'explanation'
  | 'mechanism'
  | 'causation'
  | 'calculation'
  | 'hypothesis_generation'
  | 'research'
  | 'general_inquiry';

export type ComplexityFactor = 'advanced_topic' | 'interdisciplinary' | 'innovative_thinking';

export type SourceKind =
  | 'peer_reviewed'
  | 'preprint'
  | 'experimental'
  | 'theoretical'
  | 'government'
  | 'educational'
  | 'news'
  | 'book'
  | 'conference';

export interface Query {
  readonly id: string;
  readonly question: string;
  readonly context: string;
  readonly complexity: ComplexityLevel;
  readonly requiredConfidence: ConfidenceLevel;
  readonly timeLimitSec: number;
  readonly submittedAt: string;
  readonly userId?: string;
  readonly tags: readonly string[];
}

export interface SourceRecord {
  readonly url: string;
  readonly title: string;
  readonly kind: SourceKind;
  readonly credibility: number;
  readonly relevance: number;
}

export interface AgentResult {
  readonly role: Role;
  readonly content: string;
  readonly confidence: number;
  readonly confidenceLevel: ConfidenceLevel;
  readonly sources: readonly SourceRecord[];
  readonly reasoning: string;
  readonly questionsRaised: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly processingMs: number;
  readonly timestamp: string;
  readonly degraded: boolean;
}

export type RoleResultMap = Partial<Record<Role, AgentResult>>;

export interface SuccessCriteria {
  minSources: number;
  minConfidence: ConfidenceLevel;
  requiredPerspectives: number;
}

export interface ExecutionPlan {
  queryType: QueryType;
  complexityFactors: ReadonlySet<ComplexityFactor>;
  requiredRoles: ReadonlySet<Role>;
  strategy: ExecutionStrategy;
  successCriteria: SuccessCriteria;
  estimatedProcessingSec: number;
}

export interface RoleTask {
  readonly role: Role;
  readonly priority: number;
  readonly hints: Readonly<Record<string, unknown>>;
}

export interface Contradiction {
  terms: [string, string];
  description: string;
}

export type ExpectedAspect = 'mechanism' | 'causation' | 'definition';

export interface KnowledgeGap {
  aspect: ExpectedAspect;
  description: string;
}

export interface RoleSummary {
  contentLength: number;
  sourceCount: number;
  confidence: number;
  confidenceLevel: ConfidenceLevel;
  processingMs: number;
  degraded: boolean;
}

export interface Synthesis {
  unifiedSources: SourceRecord[];
  keyInsights: Partial<Record<Role, string[]>>;
  contradictions: Contradiction[];
  gaps: KnowledgeGap[];
  roleSummaries: Partial<Record<Role, RoleSummary>>;
  unifiedQuestions: string[];
}

export interface CriteriaCheck {
  sourcesMet: boolean;
  perspectivesMet: boolean;
  confidenceMet: boolean;
}

export interface ConfidenceAssessment {
  score: number;
  level: ConfidenceLevel;
  factors: {
    sourceQuality: number;
    roleAgreement: number;
    coverage: number;
    contradictionPenalty: number;
  };
  criteria: CriteriaCheck;
  meetsRequiredConfidence: boolean;
  strengths: string[];
  issues: string[];
}

export type QueryStatus =
  | 'queued'
  | 'planning'
  | 'distributing'
  | 'executing'
  | 'synthesizing'
  | 'validating'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type TerminalStatus = Extract<QueryStatus, 'completed' | 'failed' | 'cancelled'>;

export interface SwarmResult {
  queryId: string;
  query: Query;
  master: AgentResult;
  results: RoleResultMap;
  synthesis: Synthesis;
  confidence: ConfidenceLevel;
  assessment: ConfidenceAssessment | null;
  durationMs: number;
  timestamp: string;
  status: TerminalStatus;
  error?: { code: string; message: string };
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function confidenceLevelFromScore(score: number): ConfidenceLevel {
  if (score >= 0.8) return 'high';
  if (score >= 0.6) return 'medium';
  return 'low';
}

export function compareConfidence(a: ConfidenceLevel, b: ConfidenceLevel): number {
  return CONFIDENCE_LEVELS.indexOf(a) - CONFIDENCE_LEVELS.indexOf(b);
}

export function complexityAtLeast(level: ComplexityLevel, floor: ComplexityLevel): boolean {
  return COMPLEXITY_LEVELS.indexOf(level) >= COMPLEXITY_LEVELS.indexOf(floor);
}

export function buildSourceRecord(input: {
  url: string;
  title: string;
  kind: SourceKind;
  credibility: number;
  relevance?: number;
}): SourceRecord {
  return Object.freeze({
    url: input.url,
    title: input.title,
    kind: input.kind,
    credibility: clamp01(input.credibility),
    relevance: clamp01(input.relevance ?? 0),
  });
}
