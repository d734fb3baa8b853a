import {
  AgentResult,
  clamp01,
  compareConfidence,
  ConfidenceAssessment,
  confidenceLevelFromScore,
  ConfidenceLevel,
  RoleResultMap,
  SuccessCriteria,
  Synthesis,
} from './swarm-types';

const SOURCE_QUALITY_WEIGHT = 0.3;
const ROLE_AGREEMENT_WEIGHT = 0.3;
const COVERAGE_WEIGHT = 0.2;
const GAP_COVERAGE_STEP = 0.2;
const CONTRADICTION_PENALTY = 0.1;

const MIN_PERSPECTIVES_FOR_STRENGTH = 3;
const MIN_SOURCES_FOR_STRENGTH = 3;

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function roundScore(value: number): number {
  return Math.round(value * 1_000) / 1_000;
}

function meets(level: ConfidenceLevel, floor: ConfidenceLevel): boolean {
  return compareConfidence(level, floor) >= 0;
}

/**
 * Aggregate confidence for a synthesized answer. The returned level is authoritative; the
 * criteria check, strengths and issues are informational and never move it.
 */
export function validateConfidence(params: {
  synthesis: Synthesis;
  results: RoleResultMap;
  criteria: SuccessCriteria;
  requiredConfidence: ConfidenceLevel;
}): ConfidenceAssessment {
  const results = Object.values(params.results).filter((result): result is AgentResult => result !== undefined);
  const { unifiedSources, gaps, contradictions } = params.synthesis;

  const sourceQuality = average(unifiedSources.map((source) => source.credibility));
  const confidentRoles = results.filter((result) => meets(result.confidenceLevel, 'medium')).length;
  const roleAgreement = results.length === 0 ? 0 : confidentRoles / results.length;
  const coverage = Math.max(0, 1 - GAP_COVERAGE_STEP * gaps.length);
  const contradictionPenalty = CONTRADICTION_PENALTY * contradictions.length;

  const rawScore = clamp01(
    SOURCE_QUALITY_WEIGHT * sourceQuality +
      ROLE_AGREEMENT_WEIGHT * roleAgreement +
      COVERAGE_WEIGHT * coverage -
      contradictionPenalty,
  );
  // Rounding is for reporting only; the level uses the exact score.
  const level = confidenceLevelFromScore(rawScore);

  const perspectives = results.filter((result) => !result.degraded).length;
  const strengths: string[] = [];
  const issues: string[] = [];
  if (results.length >= MIN_PERSPECTIVES_FOR_STRENGTH) {
    strengths.push('Multiple role perspectives');
  } else {
    issues.push('Limited role participation');
  }
  if (unifiedSources.length >= MIN_SOURCES_FOR_STRENGTH) {
    strengths.push('Adequate source coverage');
  } else {
    issues.push('Limited source coverage');
  }

  return {
    score: roundScore(rawScore),
    level,
    factors: {
      sourceQuality: roundScore(sourceQuality),
      roleAgreement: roundScore(roleAgreement),
      coverage: roundScore(coverage),
      contradictionPenalty: roundScore(contradictionPenalty),
    },
    criteria: {
      sourcesMet: unifiedSources.length >= params.criteria.minSources,
      perspectivesMet: perspectives >= params.criteria.requiredPerspectives,
      confidenceMet: meets(level, params.criteria.minConfidence),
    },
    meetsRequiredConfidence: meets(level, params.requiredConfidence),
    strengths,
    issues,
  };
}
