import { readFile } from "fs/promises";
import { z } from "zod";
import type { EvaluationExample } from "./types";

const exampleSchema = z.object({
  id: z.string().trim().min(1),
  question: z.string().trim().min(1, "Question is required"),
  referenceAnswer: z.string().default(""),
  referenceCitations: z.array(z.string()).default([]),
});

export const evaluationDatasetSchema = z
  .object({
    name: z.string().optional(),
    examples: z.array(exampleSchema).min(1, "Dataset has no examples"),
  })
  .superRefine(({ examples }, ctx) => {
    const seen = new Set<string>();
    examples.forEach(({ id }, index) => {
      if (seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["examples", index, "id"],
          message: `Duplicate example id "${id}"`,
        });
      }
      seen.add(id);
    });
  });

export interface EvaluationDataset {
  name?: string;
  examples: EvaluationExample[];
}

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetError";
  }
}

export function parseDataset(raw: unknown): EvaluationDataset {
  const parsed = evaluationDatasetSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new DatasetError(`Invalid evaluation dataset: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export async function loadDataset(path: string): Promise<EvaluationDataset> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DatasetError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseDataset(raw);
}
