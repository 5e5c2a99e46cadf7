import { z } from "zod";

import { MAX_LINE_ITEMS } from "../domain/calculator/line-items.js";
import { scheduleKinds } from "../domain/rulesets/types.js";

export const beginConversationSchema = z.object({
  conversationId: z.string().trim().min(1).max(200)
});

export const conversationParamsSchema = z.object({
  id: z.string().min(1).max(200)
});

export const turnSchema = z.object({
  text: z.string().max(2000)
});

export const scheduleParamsSchema = z.object({
  kind: z.enum(scheduleKinds)
});

export const removeBracketParamsSchema = scheduleParamsSchema.extend({
  min: z.coerce.number().min(0)
});

// Bounds and rate ranges are checked by the schedule mutations, which report them as configuration errors.
export const bracketSchema = z.object({
  min: z.number(),
  max: z.number().nullable(),
  rate: z.number()
});

export const derivedSalarySchema = z.object({
  percent: z.number()
});

export const calculationSchema = z.object({
  items: z
    .array(
      z.object({
        name: z.string().trim().min(1).max(100),
        price: z.number().positive(),
        dice: z.union([z.number().int(), z.string().min(1).max(10)])
      })
    )
    .min(1)
    .max(MAX_LINE_ITEMS),
  expenses: z.number().min(0).default(0),
  includeCeoSalary: z.boolean().default(false),
  salaryPercent: z.number().min(0).max(100).optional()
});
