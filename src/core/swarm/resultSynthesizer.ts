import { SynthesisError } from './swarmErrors';
import {
  AgentResult,
  Contradiction,
  ExpectedAspect,
  KnowledgeGap,
  Role,
  RoleResultMap,
  RoleSummary,
  ROLES,
  SourceRecord,
  Synthesis,
} from './swarm-types';

const MAX_INSIGHTS_PER_ROLE = 5;
const MIN_MASTER_INSIGHT_CHARS = 20;

const INSIGHT_KEYWORDS: Record<Role, string[]> = {
  master: ['important', 'key', 'significant', 'crucial', 'fundamental'],
  search: ['research', 'study', 'findings', 'evidence', 'data'],
  innovation: ['novel', 'innovative', 'breakthrough', 'paradigm', 'revolutionary'],
  analysis: ['question', 'analysis', 'implication', 'consequence', 'deeper'],
};

export const ANTONYM_PAIRS: ReadonlyArray<readonly [string, string]> = [
  ['true', 'false'],
  ['correct', 'incorrect'],
  ['possible', 'impossible'],
  ['proven', 'unproven'],
  ['always', 'never'],
];

interface AspectRule {
  aspect: ExpectedAspect;
  interrogative: string;
  indicators: string[];
}

const ASPECT_RULES: AspectRule[] = [
  { aspect: 'mechanism', interrogative: 'how', indicators: ['mechanism', 'process', 'works'] },
  { aspect: 'causation', interrogative: 'why', indicators: ['causation', 'cause', 'because', 'reason'] },
  { aspect: 'definition', interrogative: 'what', indicators: ['definition', 'defined', 'refers to'] },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function containsWord(text: string, term: string): boolean {
  return new RegExp(`\\b${escapeRegExp(term)}\\b`).test(text);
}

/** Results in fixed role order so the synthesis does not depend on map insertion order. */
function orderedResults(results: RoleResultMap): AgentResult[] {
  const ordered: AgentResult[] = [];
  for (const role of ROLES) {
    const result = results[role];
    if (result) ordered.push(result);
  }
  return ordered;
}

export function unifySources(results: AgentResult[]): SourceRecord[] {
  const byUrl = new Map<string, SourceRecord>();
  for (const result of results) {
    for (const source of result.sources) {
      const existing = byUrl.get(source.url);
      if (!existing || source.credibility > existing.credibility) {
        byUrl.set(source.url, source);
      }
    }
  }
  // Array.prototype.sort is stable, so equal credibility keeps first-seen order.
  return [...byUrl.values()].sort((a, b) => b.credibility - a.credibility);
}

export function extractInsights(role: Role, content: string): string[] {
  const keywords = INSIGHT_KEYWORDS[role];
  const insights: string[] = [];
  for (const raw of content.split('.')) {
    const sentence = raw.trim();
    if (!sentence) continue;
    if (role === 'master' && sentence.length <= MIN_MASTER_INSIGHT_CHARS) continue;
    const lowered = sentence.toLowerCase();
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      insights.push(sentence);
      if (insights.length >= MAX_INSIGHTS_PER_ROLE) break;
    }
  }
  return insights;
}

export function detectContradictions(corpus: string): Contradiction[] {
  const lowered = corpus.toLowerCase();
  return ANTONYM_PAIRS.filter(([a, b]) => containsWord(lowered, a) && containsWord(lowered, b)).map(
    ([a, b]): Contradiction => ({
      terms: [a, b],
      description: `Potential contradiction found regarding ${a}/${b}`,
    }),
  );
}

export function detectGaps(question: string, corpus: string): KnowledgeGap[] {
  const loweredQuestion = question.toLowerCase();
  const loweredCorpus = corpus.toLowerCase();
  return ASPECT_RULES.filter((rule) => containsWord(loweredQuestion, rule.interrogative))
    .filter((rule) => !rule.indicators.some((term) => containsWord(loweredCorpus, term)))
    .map((rule) => ({ aspect: rule.aspect, description: `Missing ${rule.aspect} explanation` }));
}

function unifyQuestions(results: AgentResult[]): string[] {
  const seen = new Set<string>();
  for (const result of results) {
    for (const question of result.questionsRaised) {
      const trimmed = question.trim();
      if (trimmed) seen.add(trimmed);
    }
  }
  return [...seen];
}

function summarize(result: AgentResult): RoleSummary {
  return {
    contentLength: result.content.length,
    sourceCount: result.sources.length,
    confidence: result.confidence,
    confidenceLevel: result.confidenceLevel,
    processingMs: result.processingMs,
    degraded: result.degraded,
  };
}

export function emptySynthesis(): Synthesis {
  return {
    unifiedSources: [],
    keyInsights: {},
    contradictions: [],
    gaps: [],
    roleSummaries: {},
    unifiedQuestions: [],
  };
}

/**
 * Merge every role's output into one synthesis. Pure: the same map and question always
 * produce an equal synthesis.
 *
 * @throws SynthesisError when no role produced a result.
 */
export function synthesizeResults(params: { results: RoleResultMap; question: string }): Synthesis {
  const ordered = orderedResults(params.results);
  if (ordered.length === 0) {
    throw new SynthesisError('Cannot synthesize an empty result set', { question: params.question });
  }

  const contributing = ordered.filter((result) => !result.degraded);
  const corpus = contributing.map((result) => result.content).join('\n');

  const keyInsights: Partial<Record<Role, string[]>> = {};
  const roleSummaries: Partial<Record<Role, RoleSummary>> = {};
  for (const result of ordered) {
    keyInsights[result.role] = result.degraded ? [] : extractInsights(result.role, result.content);
    roleSummaries[result.role] = summarize(result);
  }

  return {
    unifiedSources: unifySources(ordered),
    keyInsights,
    contradictions: detectContradictions(corpus),
    gaps: detectGaps(params.question, corpus),
    roleSummaries,
    unifiedQuestions: unifyQuestions(ordered),
  };
}
