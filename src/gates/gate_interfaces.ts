export const GATE_ETHICS = "ethics" as const;
export const GATE_CORRECTION_RESCREEN = "correction_rescreen" as const;

export type GateName = typeof GATE_ETHICS | typeof GATE_CORRECTION_RESCREEN;

export interface GateOutput {
  gateName: GateName;
  status: "pass" | "fail" | "warn";
  summary: string;
  metadata?: Record<string, unknown>;
}
