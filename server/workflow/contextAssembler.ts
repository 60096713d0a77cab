/**
 * Context Assembler
 *
 * Merges evidence from every section into one context block for the answer
 * generator. Sections keep their own headings so the model can attribute
 * provenance; each item carries its source inline. Citations are
 * deduplicated here, not when they are collected.
 */

import {
  EVIDENCE_SECTIONS,
  type AssembledContext,
  type Citation,
  type EvidenceItem,
  type EvidenceSection,
  type EvidenceSet,
} from "./types";

export const NO_CONTEXT_TEXT = "No relevant context found in knowledge base or web search.";

const RULE = "=".repeat(60);

const SECTION_LABELS: Record<EvidenceSection, { heading: string; item: string }> = {
  entities: { heading: "KNOWLEDGE STORE ENTITIES (Key Concepts)", item: "Entity" },
  relationships: { heading: "KNOWLEDGE STORE RELATIONSHIPS (Connections)", item: "Relationship" },
  episodes: { heading: "SOURCE PASSAGES (Document Excerpts)", item: "Passage" },
  communities: { heading: "TOPIC SUMMARIES (Clustered Knowledge)", item: "Topic" },
  web: { heading: "WEB SEARCH RESULTS (Recent Information)", item: "Web Result" },
};

function attributionLines(section: EvidenceSection, citation: Citation): string[] {
  if (section !== "web") {
    return [`  Source: ${citation.title ?? citation.sourceId}`];
  }

  const lines: string[] = [];
  if (citation.title) lines.push(`  Title: ${citation.title}`);
  if (citation.url) lines.push(`  URL: ${citation.url}`);
  if (lines.length === 0) lines.push(`  Source: ${citation.sourceId}`);
  return lines;
}

function formatSection(section: EvidenceSection, items: readonly EvidenceItem[]): string[] {
  const { heading, item: itemLabel } = SECTION_LABELS[section];
  const lines = [RULE, heading, RULE];

  items.forEach((item, index) => {
    lines.push(`\n[${itemLabel} ${index + 1}]`);
    lines.push(item.content);
    lines.push(...attributionLines(section, item.citation));
  });

  lines.push("");
  return lines;
}

/**
 * Unique by sourceId, first occurrence wins, section order preserved.
 */
export function dedupeCitations(citations: Iterable<Citation>): Citation[] {
  const seen = new Map<string, Citation>();
  for (const citation of citations) {
    if (!seen.has(citation.sourceId)) {
      seen.set(citation.sourceId, citation);
    }
  }
  return Array.from(seen.values());
}

export function assembleContext(evidence: EvidenceSet): AssembledContext {
  const lines: string[] = [];
  const citations: Citation[] = [];

  for (const section of EVIDENCE_SECTIONS) {
    const items = evidence[section];
    if (items.length === 0) continue;

    lines.push(...formatSection(section, items));
    citations.push(...items.map((item) => item.citation));
  }

  return {
    text: lines.length > 0 ? lines.join("\n") : NO_CONTEXT_TEXT,
    citations: dedupeCitations(citations),
  };
}
