import { clampUnit } from "../reasoning/confidence_factors";

export type ConfidenceContext = {
  reasoningConfidence?: number;
  nluConfidence?: number;
};

export class ConfidenceAssessor {
  private readonly enabled: boolean;

  constructor(opts: { enabled?: boolean } = {}) {
    this.enabled = opts.enabled ?? true;
  }

  /**
   * Mean of reasoning and NLU confidence, a missing signal counting as zero.
   * Non-decreasing in either input while the other is held fixed.
   */
  assess(_response: string, context: ConfidenceContext): number {
    if (!this.enabled) return 1.0;
    const reasoning = clampUnit(context.reasoningConfidence ?? 0);
    const nlu = clampUnit(context.nluConfidence ?? 0);
    if (reasoning === 0 && nlu === 0) return 0;
    return clampUnit((reasoning + nlu) / 2);
  }
}
