import { describe, expect, it } from 'vitest';
import {
  assessComplexityFactors,
  classifyQueryType,
  defineSuccessCriteria,
  determineRequiredRoles,
  planQuery,
  selectStrategy,
} from '../../../src/core/swarm/queryPlanner';
import { PlanningError } from '../../../src/core/swarm/swarmErrors';
import { Query } from '../../../src/core/swarm/swarm-types';
import { makeQuery } from './fixtures';

describe('planQuery', () => {
  it('plans a basic definition question with every role, sequentially', () => {
    const plan = planQuery(makeQuery({ question: "What is Newton's first law of motion?", complexity: 'basic' }));

    expect(plan.queryType).toBe('explanation');
    expect([...plan.requiredRoles]).toEqual(['master', 'search', 'innovation', 'analysis']);
    expect(plan.strategy).toBe('sequential');
    expect(plan.complexityFactors.size).toBe(0);
    expect(plan.estimatedProcessingSec).toBe(15);
    expect(plan.successCriteria).toEqual({ minSources: 3, minConfidence: 'medium', requiredPerspectives: 2 });
  });

  it('plans an advanced research question with search and analysis, hierarchically', () => {
    const plan = planQuery(
      makeQuery({ question: 'What are the latest experimental results on dark matter?', complexity: 'advanced' }),
    );

    expect(plan.queryType).toBe('research');
    expect([...plan.requiredRoles]).toEqual(['master', 'search', 'analysis']);
    expect(plan.strategy).toBe('hierarchical');
  });

  it('throws PlanningError for a structurally invalid query', () => {
    const query: Query = {
      id: 'bad-query',
      question: 'Short?',
      context: '',
      complexity: 'basic',
      requiredConfidence: 'medium',
      timeLimitSec: 180,
      submittedAt: '2026-01-01T00:00:00.000Z',
      tags: [],
    };

    expect(() => planQuery(query)).toThrow(PlanningError);
  });
});

describe('classifyQueryType', () => {
  it('applies the first matching rule', () => {
    expect(classifyQueryType('How does entropy explain the arrow of time?')).toBe('explanation');
    expect(classifyQueryType('How do magnets attract iron filings?')).toBe('mechanism');
    expect(classifyQueryType('Why do stars twinkle at night?')).toBe('causation');
    expect(classifyQueryType('Calculate the escape velocity of Mars')).toBe('calculation');
    expect(classifyQueryType('Propose a hypothesis for fast radio bursts')).toBe('hypothesis_generation');
  });

  it('falls back to a general inquiry', () => {
    expect(classifyQueryType('Tell me about black holes')).toBe('general_inquiry');
  });
});

describe('assessComplexityFactors', () => {
  it('adds time for each detected factor on top of the base estimate', () => {
    const { factors, estimatedProcessingSec } = assessComplexityFactors(
      'A novel quantum approach to complex materials',
    );

    expect(factors).toEqual(new Set(['advanced_topic', 'interdisciplinary', 'innovative_thinking']));
    expect(estimatedProcessingSec).toBe(90);
  });
});

describe('determineRequiredRoles', () => {
  it('adds only the triggered optional roles', () => {
    expect([...determineRequiredRoles('Propose a novel superconductor design', 'intermediate')]).toEqual([
      'master',
      'innovation',
    ]);
  });

  it('adds analysis from advanced complexity upward', () => {
    expect([...determineRequiredRoles('Summarise recent evidence for inflation', 'research')]).toEqual([
      'master',
      'search',
      'analysis',
    ]);
  });
});

describe('selectStrategy', () => {
  it('maps each complexity level to its strategy', () => {
    expect(selectStrategy('basic')).toBe('sequential');
    expect(selectStrategy('intermediate')).toBe('parallel');
    expect(selectStrategy('advanced')).toBe('hierarchical');
    expect(selectStrategy('research')).toBe('full_orchestration');
  });
});

describe('defineSuccessCriteria', () => {
  it('raises the bar for research questions', () => {
    expect(defineSuccessCriteria('research')).toEqual({
      minSources: 5,
      minConfidence: 'medium',
      requiredPerspectives: 3,
    });
    expect(defineSuccessCriteria('advanced')).toEqual({
      minSources: 3,
      minConfidence: 'medium',
      requiredPerspectives: 2,
    });
  });
});
