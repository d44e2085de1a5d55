import { z } from "zod";

export const SessionParamsSchema = z.object({
  sessionId: z.string().trim().min(1).max(200),
});
