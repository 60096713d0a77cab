import { isPositive, type LanguageModelGateway } from "../llm/gateway";
import { logDebug, errorMessage } from "../utils/logger";
import { replaceEvidence } from "./state";
import {
  EVIDENCE_COMPONENTS,
  type EvidenceComponent,
  type EvidenceItem,
  type EvidenceSet,
  type PipelineLogContext,
} from "./types";

export interface RelevanceFilterResult {
  evidence: EvidenceSet;
  graded: number;
  kept: number;
  graderFailures: number;
}

interface Verdict {
  relevant: boolean;
  failed: boolean;
}

async function gradeItem(
  gateway: LanguageModelGateway,
  question: string,
  item: EvidenceItem,
  logContext: PipelineLogContext
): Promise<Verdict> {
  try {
    const grade = await gateway.classify("relevance-grade", { question, document: item.content }, logContext);
    return { relevant: isPositive(grade), failed: false };
  } catch (error) {
    // a grading failure keeps the item rather than forcing another retrieval
    logDebug("relevance_grade_failed", {
      requestId: logContext.requestId,
      stage: "relevanceFilter",
      sourceId: item.citation.sourceId,
      error: errorMessage(error),
    });
    return { relevant: true, failed: true };
  }
}

/**
 * Grade every knowledge store item independently and concurrently, then keep
 * the relevant ones in their original order. Web results pass through.
 */
export async function filterRelevant(
  gateway: LanguageModelGateway,
  question: string,
  evidence: EvidenceSet,
  logContext: PipelineLogContext
): Promise<RelevanceFilterResult> {
  const candidates = EVIDENCE_COMPONENTS.flatMap((component) =>
    evidence[component].map((item) => ({ component, item }))
  );

  const verdicts = await Promise.all(
    candidates.map(({ item }) => gradeItem(gateway, question, item, logContext))
  );

  const kept: Record<EvidenceComponent, EvidenceItem[]> = {
    entities: [],
    relationships: [],
    episodes: [],
    communities: [],
  };

  candidates.forEach(({ component, item }, index) => {
    if (verdicts[index].relevant) {
      kept[component].push(item);
    }
  });

  const keptCount = verdicts.filter((v) => v.relevant).length;

  return {
    evidence: replaceEvidence(evidence, kept),
    graded: candidates.length,
    kept: keptCount,
    graderFailures: verdicts.filter((v) => v.failed).length,
  };
}
