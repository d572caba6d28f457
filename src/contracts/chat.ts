import { z } from "zod";

export const USER_ROLES = ["technical_expert", "beginner", "general"] as const;

export const TurnRequest = z.object({
  sessionId: z.string().min(1).max(200),
  message: z.string().trim().min(1).max(20_000),
  userRole: z.enum(USER_ROLES).optional(),
});

export type TurnRequest = z.infer<typeof TurnRequest>;

export const RecentCorrectionsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(10).default(10),
});
