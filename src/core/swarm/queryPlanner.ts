import { assertValidQuery } from './query';
import {
  ComplexityFactor,
  ComplexityLevel,
  complexityAtLeast,
  ExecutionPlan,
  ExecutionStrategy,
  OPTIONAL_ROLES,
  Query,
  QueryType,
  Role,
  SuccessCriteria,
} from './swarm-types';

interface QueryTypeRule {
  type: QueryType;
  triggers: string[];
}

// Evaluated top to bottom, first match wins: "how does X explain Y" is an explanation, not a mechanism.
const QUERY_TYPE_RULES: QueryTypeRule[] = [
  { type: 'explanation', triggers: ['what is', 'define', 'explain'] },
  { type: 'mechanism', triggers: ['how', 'mechanism', 'process'] },
  { type: 'causation', triggers: ['why', 'reason', 'cause'] },
  { type: 'calculation', triggers: ['calculate', 'solve', 'find', 'compute'] },
  { type: 'hypothesis_generation', triggers: ['hypothesis', 'theory', 'propose', 'novel'] },
  { type: 'research', triggers: ['research', 'latest', 'current', 'recent'] },
];

const COMPLEXITY_FACTOR_RULES: Array<{ factor: ComplexityFactor; triggers: string[]; seconds: number }> = [
  { factor: 'advanced_topic', triggers: ['quantum', 'relativistic', 'field theory'], seconds: 30 },
  { factor: 'interdisciplinary', triggers: ['interdisciplinary', 'multiple', 'complex'], seconds: 20 },
  { factor: 'innovative_thinking', triggers: ['novel', 'breakthrough', 'innovative'], seconds: 25 },
];

const BASE_PROCESSING_SEC = 15;

const SEARCH_TRIGGERS = ['research', 'latest', 'current', 'recent', 'study', 'evidence'];
const INNOVATION_TRIGGERS = ['novel', 'innovative', 'breakthrough', 'first principles'];

const STRATEGY_BY_COMPLEXITY: Record<ComplexityLevel, ExecutionStrategy> = {
  basic: 'sequential',
  intermediate: 'parallel',
  advanced: 'hierarchical',
  research: 'full_orchestration',
};

function containsAny(text: string, triggers: string[]): boolean {
  return triggers.some((trigger) => text.includes(trigger));
}

export function classifyQueryType(question: string): QueryType {
  const normalized = question.toLowerCase();
  const rule = QUERY_TYPE_RULES.find((candidate) => containsAny(normalized, candidate.triggers));
  return rule?.type ?? 'general_inquiry';
}

export function assessComplexityFactors(question: string): {
  factors: Set<ComplexityFactor>;
  estimatedProcessingSec: number;
} {
  const normalized = question.toLowerCase();
  const factors = new Set<ComplexityFactor>();
  let estimatedProcessingSec = BASE_PROCESSING_SEC;
  for (const rule of COMPLEXITY_FACTOR_RULES) {
    if (containsAny(normalized, rule.triggers)) {
      factors.add(rule.factor);
      estimatedProcessingSec += rule.seconds;
    }
  }
  return { factors, estimatedProcessingSec };
}

/**
 * Master is always present. When the question triggers no optional role, every optional
 * role is added so Master never answers alone.
 */
export function determineRequiredRoles(question: string, complexity: ComplexityLevel): Set<Role> {
  const normalized = question.toLowerCase();
  const roles = new Set<Role>(['master']);

  if (containsAny(normalized, SEARCH_TRIGGERS)) roles.add('search');
  if (containsAny(normalized, INNOVATION_TRIGGERS)) roles.add('innovation');
  if (complexityAtLeast(complexity, 'advanced')) roles.add('analysis');

  if (roles.size === 1) {
    for (const role of OPTIONAL_ROLES) roles.add(role);
  }
  return roles;
}

export function selectStrategy(complexity: ComplexityLevel): ExecutionStrategy {
  return STRATEGY_BY_COMPLEXITY[complexity];
}

export function defineSuccessCriteria(complexity: ComplexityLevel): SuccessCriteria {
  if (complexity === 'research') {
    return { minSources: 5, minConfidence: 'medium', requiredPerspectives: 3 };
  }
  return { minSources: 3, minConfidence: 'medium', requiredPerspectives: 2 };
}

/**
 * Classify a query and decide which roles run under which strategy.
 *
 * @throws PlanningError when the query is structurally invalid.
 */
export function planQuery(query: Query): ExecutionPlan {
  const valid = assertValidQuery(query);
  const complexity = assessComplexityFactors(valid.question);

  return {
    queryType: classifyQueryType(valid.question),
    complexityFactors: complexity.factors,
    requiredRoles: determineRequiredRoles(valid.question, valid.complexity),
    strategy: selectStrategy(valid.complexity),
    successCriteria: defineSuccessCriteria(valid.complexity),
    estimatedProcessingSec: complexity.estimatedProcessingSec,
  };
}
