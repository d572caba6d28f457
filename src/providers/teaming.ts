import type { TeamingProvider, TurnContext } from "../contracts/collaborators";

export const CLARIFY_SECURITY =
  "I'm not entirely clear on the security aspect of your request. Could you specify the system or the type of vulnerability you're interested in?";
export const CLARIFY_DEPLOYMENT =
  "I need more details about the deployment. Which environment are you targeting, and what service are you deploying?";
export const CLARIFY_GENERIC =
  "I'm not entirely sure I understood your request. Could you rephrase or provide more context?";

const ROLE_OPENERS: Record<string, string> = {
  technical_expert: "Acknowledged.",
  beginner: "Let me explain that in simpler terms.",
};

const SENTIMENT_OPENERS: Record<string, string> = {
  negative: "I understand your concern.",
  positive: "Great!",
};

/**
 * Rule-based clarification and tone adaptation.
 */
export class RuleBasedTeamingProvider implements TeamingProvider {
  private readonly clarificationThreshold: number;
  private readonly adaptiveCommunication: boolean;

  constructor(opts: { clarificationThreshold?: number; adaptiveCommunication?: boolean } = {}) {
    this.clarificationThreshold = opts.clarificationThreshold ?? 0.4;
    this.adaptiveCommunication = opts.adaptiveCommunication ?? true;
  }

  async maybeClarify(query: string, confidence: number, _context: TurnContext): Promise<string | null> {
    if (confidence >= this.clarificationThreshold) return null;
    const lower = query.toLowerCase();
    if (lower.includes("security")) return CLARIFY_SECURITY;
    if (lower.includes("deploy")) return CLARIFY_DEPLOYMENT;
    return CLARIFY_GENERIC;
  }

  async adapt(_query: string, response: string, context: TurnContext): Promise<string> {
    if (!this.adaptiveCommunication) return response;

    // Sentiment wins over role when both apply.
    const opener =
      (context.sentiment ? SENTIMENT_OPENERS[context.sentiment] : undefined) ??
      (context.userRole ? ROLE_OPENERS[context.userRole] : undefined);
    if (!opener || response.startsWith(opener)) return response;
    return `${opener} ${response}`;
  }
}
