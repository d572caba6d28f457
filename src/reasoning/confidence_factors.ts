export type ConfidenceFactor = {
  name: string;
  score: number;
  weight: number;
};

export function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Weighted mean over the factors present. Weights are renormalised, so an
 * omitted factor does not drag the result down.
 */
export function weightedConfidence(factors: ConfidenceFactor[]): number {
  const totalWeight = factors.reduce((sum, f) => sum + f.weight, 0);
  if (totalWeight <= 0) return 0;
  const weighted = factors.reduce((sum, f) => sum + clampUnit(f.score) * f.weight, 0);
  return clampUnit(weighted / totalWeight);
}

export function reasoningConfidenceFactors(args: {
  nluConfidence: number;
  knowledgeItems: number;
  executed: number;
  succeeded: number;
  responseLength: number;
}): ConfidenceFactor[] {
  const factors: ConfidenceFactor[] = [
    { name: "nlu_confidence", score: clampUnit(args.nluConfidence), weight: 0.3 },
    { name: "knowledge_volume", score: Math.min(args.knowledgeItems / 10, 1), weight: 0.2 },
  ];
  if (args.executed > 0) {
    factors.push({ name: "execution_success", score: args.succeeded / args.executed, weight: 0.3 });
  }
  factors.push({ name: "response_length", score: Math.min(args.responseLength / 200, 1), weight: 0.2 });
  return factors;
}
