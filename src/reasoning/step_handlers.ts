import type { KnowledgeItem, RetrievedKnowledge } from "../contracts/collaborators";
import type { ReasoningFlags } from "../contracts/reasoning";

export type StepContext = {
  query: string;
  intent: string;
  knowledge: RetrievedKnowledge;
  flags: ReasoningFlags;
};

export type StepOutput = {
  status: string;
  content?: string;
};

export type StepHandler = (ctx: StepContext) => StepOutput | Promise<StepOutput>;

export type StepHandlerTable = Partial<Record<string, StepHandler>>;

const MAX_COMPONENT_CHARS = 300;

function excerpt(item: KnowledgeItem): string {
  const text = item.content.replace(/\s+/g, " ").trim();
  return text.length > MAX_COMPONENT_CHARS ? `${text.slice(0, MAX_COMPONENT_CHARS - 3)}...` : text;
}

export function totalKnowledgeItems(knowledge: RetrievedKnowledge): number {
  return (
    knowledge.conversationHistory.length +
    knowledge.generalKnowledge.length +
    knowledge.securityKnowledge.length +
    knowledge.externalData.length
  );
}

function fromFirst(items: KnowledgeItem[], label: string): StepOutput {
  const first = items[0];
  if (!first) return { status: `No ${label} available` };
  return { status: `Used ${label} "${first.title}"`, content: excerpt(first) };
}

/**
 * Execute-phase vocabulary. Names missing from the table run as a no-op that succeeds.
 */
export const DEFAULT_STEP_HANDLERS: StepHandlerTable = {
  acknowledge_greeting: () => ({ status: "Greeting acknowledged" }),
  understand_question: ({ query }) => ({ status: `Question parsed (${query.length} chars)` }),
  understand_query: ({ query }) => ({ status: `Query parsed (${query.length} chars)` }),
  analyze_security_context: ({ flags }) => ({
    status: `Security context analysed (complexity: ${flags.queryComplexity})`,
  }),
  analyze_technical_problem: ({ flags }) => ({
    status: `Technical problem analysed (complexity: ${flags.queryComplexity})`,
  }),
  retrieve_relevant_info: ({ knowledge }) => ({
    status: `Found ${knowledge.generalKnowledge.length} relevant knowledge items`,
  }),
  retrieve_context: ({ knowledge }) => ({ status: `Found ${totalKnowledgeItems(knowledge)} context items` }),
  retrieve_technical_docs: ({ knowledge }) => ({
    status: `Found ${knowledge.generalKnowledge.length} technical references`,
  }),
  retrieve_security_knowledge: ({ knowledge }) =>
    fromFirst(knowledge.securityKnowledge, "security knowledge"),
  formulate_answer: ({ knowledge }) => fromFirst(knowledge.generalKnowledge, "general knowledge"),
  formulate_solution: ({ knowledge }) => fromFirst(knowledge.generalKnowledge, "technical reference"),
  assess_threats: ({ knowledge }) => {
    const titles = knowledge.externalData.map((item) => item.title).slice(0, 3);
    if (titles.length === 0) return { status: "No current threat intelligence" };
    return {
      status: `Assessed ${knowledge.externalData.length} threat reports`,
      content: `Current threat intelligence: ${titles.join("; ")}.`,
    };
  },
  break_down_problem: ({ query }) => {
    const parts = query
      .split(/\?|\band\b|;/i)
      .map((part) => part.trim())
      .filter(Boolean);
    return { status: `Split query into ${parts.length} parts` };
  },
  synthesize_information: ({ knowledge }) => ({
    status: `Cross-referenced ${totalKnowledgeItems(knowledge)} items`,
  }),
  process_visual_content: () => ({ status: "No visual input attached; continuing with text only" }),
  apply_security_filters: () => ({ status: "Security filters applied" }),
  generate_response: () => ({ status: "Ready for synthesis" }),
};
