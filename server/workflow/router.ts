import type { LanguageModelGateway, RouteDecision } from "../llm/gateway";
import { logDebug, logWarn, errorMessage } from "../utils/logger";
import type { PipelineLogContext, Route } from "./types";

export interface RouterResult {
  route: Route;
  /** True when classification failed and the direct-answer path was taken. */
  fallback: boolean;
}

/**
 * Two sequential checks: out of domain questions skip retrieval entirely;
 * in-domain questions that need current information go to the web.
 */
export function decideRoute(decision: RouteDecision): Route {
  if (!decision.inDomain) {
    return "internal-knowledge";
  }
  return decision.requiresRecency ? "web-search" : "knowledge-store";
}

export async function routeQuestion(
  gateway: LanguageModelGateway,
  question: string,
  logContext: PipelineLogContext
): Promise<RouterResult> {
  try {
    const decision = await gateway.classify("route", { question }, logContext);
    const route = decideRoute(decision);

    logDebug("router_decision", {
      requestId: logContext.requestId,
      stage: "route",
      inDomain: decision.inDomain,
      requiresRecency: decision.requiresRecency,
      route,
    });

    return { route, fallback: false };
  } catch (error) {
    logWarn("router_failed_direct_answer", {
      requestId: logContext.requestId,
      stage: "route",
      error: errorMessage(error),
    });
    return { route: "internal-knowledge", fallback: true };
  }
}
