/**
 * Ask one question against the live Gemini adapters.
 *
 * Usage: npm run ask -- "How do I treat stem canker?" [--no-relevance] [--no-groundedness] [--no-usefulness]
 */

import "dotenv/config";
import { getEnvConfig, validateEnv } from "../server/config/env";
import { createGeminiWorkflow } from "../server/gemini-client";
import { WorkflowConfigError } from "../server/workflow";
import { toWorkflowStep } from "../server/workflow/workflowRoute";

async function runAsk() {
  const args = process.argv.slice(2);
  const flags = new Set(args.filter((arg) => arg.startsWith("--")));
  const question = args.filter((arg) => !arg.startsWith("--")).join(" ") ||
    "What are the symptoms of Phytophthora stem canker?";

  validateEnv();
  const workflow = createGeminiWorkflow(getEnvConfig());

  console.log(`[Ask] Question: ${question}`);
  console.log("---------------------------------------------------");

  try {
    const result = await workflow.run(question, {
      gates: {
        relevance: !flags.has("--no-relevance"),
        groundedness: !flags.has("--no-groundedness"),
        usefulness: !flags.has("--no-usefulness"),
      },
    });

    console.log("\n=== ANSWER ===");
    console.log(result.answer);

    console.log("\n=== SOURCES ===");
    if (result.citations.length > 0) {
      result.citations.forEach((citation, i) => {
        console.log(`[${i + 1}] ${citation.title ?? citation.sourceId}${citation.url ? ` (${citation.url})` : ""}`);
      });
    } else {
      console.log("(none)");
    }

    console.log("\n=== STEPS ===");
    for (const step of result.trace.map(toWorkflowStep)) {
      console.log(`${step.timestamp}  ${step.name.padEnd(20)} ${step.processingTime.toFixed(3)}s  ${JSON.stringify(step.details)}`);
    }

    console.log(`\nRoute: ${result.route ?? "none"}  Status: ${result.status}  Duration: ${result.durationMs}ms`);
  } catch (error) {
    if (error instanceof WorkflowConfigError) {
      console.error(`[Ask] ${error.message}`);
    } else {
      console.error("[Ask] Failed:", error);
    }
    process.exitCode = 1;
  }
}

runAsk().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
