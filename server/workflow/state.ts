import {
  EVIDENCE_SECTIONS,
  type EvidenceItem,
  type EvidenceSection,
  type EvidenceSet,
  type RetryCounters,
  type WorkflowConfig,
  type WorkflowState,
} from "./types";

export function emptyEvidence(): EvidenceSet {
  return {
    entities: [],
    relationships: [],
    episodes: [],
    communities: [],
    web: [],
  };
}

/**
 * Fresh request-scoped state: zeroed counters, empty evidence.
 */
export function createInitialState(question: string, config: WorkflowConfig): WorkflowState {
  return {
    originalQuestion: question,
    currentQuestion: question,
    route: null,
    source: null,
    evidence: emptyEvidence(),
    answer: null,
    context: null,
    counters: { queryRefinement: 0, groundedness: 0 },
    webFallbackUsed: false,
    bestEffort: false,
    config,
  };
}

export function replaceEvidence(
  evidence: EvidenceSet,
  replacements: Partial<Record<EvidenceSection, readonly EvidenceItem[]>>
): EvidenceSet {
  return { ...evidence, ...replacements };
}

export function hasEvidence(evidence: EvidenceSet): boolean {
  return EVIDENCE_SECTIONS.some((section) => evidence[section].length > 0);
}

export function countEvidence(evidence: EvidenceSet): Record<EvidenceSection, number> {
  return {
    entities: evidence.entities.length,
    relationships: evidence.relationships.length,
    episodes: evidence.episodes.length,
    communities: evidence.communities.length,
    web: evidence.web.length,
  };
}

export function incrementCounter(state: WorkflowState, counter: keyof RetryCounters): WorkflowState {
  return {
    ...state,
    counters: { ...state.counters, [counter]: state.counters[counter] + 1 },
  };
}
