import type { TaskInputs, TaskKind } from "./gateway";

export interface PromptSpec {
  systemPrompt: string;
  userPrompt: string;
}

type PromptBuilders = {
  [K in TaskKind]: (input: TaskInputs[K], domain: string) => PromptSpec;
};

const JSON_ONLY = "You MUST respond with valid JSON only, no other text.";

const JUDGE_FORMAT = `${JSON_ONLY} Use this exact format:
{ "verdict": "pass" | "fail", "reasoning": "one or two sentences" }`;

function formatSources(sources: string[]): string {
  return sources.length > 0 ? sources.map((source) => `- ${source}`).join("\n") : "(none)";
}

export const PROMPT_BUILDERS: PromptBuilders = {
  route: ({ question }, domain) => ({
    systemPrompt: `You are the routing agent of a question answering system specialised in ${domain}.

Decide two things about the user's question:

1. inDomain: true when the question is about ${domain}, false otherwise.
2. requiresRecency: only meaningful when inDomain is true. Set it to true when
   the question asks for the latest, current or recent information, such as
   news, outbreaks, this year's situation or anything tied to a recent date.
   Implicit cues count ("now", "currently", a year, "new").

Do NOT answer the question.

${JSON_ONLY} Use this exact format:
{ "inDomain": true | false, "requiresRecency": true | false }`,
    userPrompt: `Question: "${question}"`,
  }),

  "relevance-grade": ({ question, document }, domain) => ({
    systemPrompt: `You grade whether a retrieved piece of ${domain} knowledge is relevant to a user question.
It does not need to answer the question fully; it is relevant when it contains keywords,
entities or facts related to the question. Be lenient: only reject clearly unrelated content.

${JSON_ONLY} Use this exact format:
{ "binaryScore": "yes" | "no" }`,
    userPrompt: `Retrieved content:
${document}

Question: "${question}"`,
  }),

  "groundedness-grade": ({ context, answer }) => ({
    systemPrompt: `You check whether an answer is grounded in a set of supplied facts.
Answer "yes" when every claim in the answer is supported by the facts, "no" otherwise.
Acknowledging that information is missing counts as grounded.

${JSON_ONLY} Use this exact format:
{ "binaryScore": "yes" | "no" }`,
    userPrompt: `Facts:
${context}

Answer:
${answer}`,
  }),

  "usefulness-grade": ({ question, answer }) => ({
    systemPrompt: `You check whether an answer resolves the user's question.
Answer "yes" when the answer addresses the intent of the question, "no" otherwise.

${JSON_ONLY} Use this exact format:
{ "binaryScore": "yes" | "no" }`,
    userPrompt: `Question: "${question}"

Answer:
${answer}`,
  }),

  "query-rewrite": ({ question }, domain) => ({
    systemPrompt: `You rewrite questions about ${domain} for retrieval from a knowledge store.

Produce one improved question that:
- expands abbreviations and local names
- adds domain qualifiers
- names the key entities (pests, diseases, symptoms, treatments) and the relation asked about
- prefers terms a technical reference would use

Keep the user's intent. Do NOT answer the question.

${JSON_ONLY} Use this exact format:
{ "refinedQuestion": "..." }`,
    userPrompt: `Question: "${question}"`,
  }),

  "answer-generate": ({ question, context }, domain) =>
    context === null
      ? {
          systemPrompt: `You are an assistant for ${domain}. Answer concisely from your own knowledge.
If the question is outside ${domain}, still answer briefly and say that it falls outside
the topics you specialise in.

${JSON_ONLY} Use this exact format:
{ "answer": "..." }`,
          userPrompt: `Question: "${question}"`,
        }
      : {
          systemPrompt: `You are an assistant for ${domain}. Answer the question using only the context.

- Combine information across the labeled sections.
- Mention the source of key facts.
- If the context does not contain enough information, say so plainly instead of guessing.

${JSON_ONLY} Use this exact format:
{ "answer": "..." }`,
          userPrompt: `Context:
${context}

Question: "${question}"`,
        },

  "correctness-judge": ({ question, referenceAnswer, answer }, domain) => ({
    systemPrompt: `You grade answers to questions about ${domain} against a reference answer.
The answer passes when it is factually consistent with the reference and covers its key
points. Extra correct detail is fine; contradictions or missing key facts fail.

${JUDGE_FORMAT}`,
    userPrompt: `Question: "${question}"

Reference answer:
${referenceAnswer}

Answer to grade:
${answer}`,
  }),

  "faithfulness-judge": ({ referenceAnswer, referenceCitations, answer, citations }) => ({
    systemPrompt: `You check whether an answer stays faithful to a reference answer and its sources.
The answer passes when it makes no claim that the reference or the cited sources would
contradict, and its sources are consistent with the reference sources.

${JUDGE_FORMAT}`,
    userPrompt: `Reference answer:
${referenceAnswer}

Reference sources:
${formatSources(referenceCitations)}

Answer to grade:
${answer}

Answer sources:
${formatSources(citations)}`,
  }),

  "relevance-judge": ({ question, answer }) => ({
    systemPrompt: `You check whether an answer addresses the question that was asked.
The answer passes when it responds to the question's intent, even partially; it fails
when it is off topic or only restates the question.

${JUDGE_FORMAT}`,
    userPrompt: `Question: "${question}"

Answer to grade:
${answer}`,
  }),
};
