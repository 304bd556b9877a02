import { z } from "zod";

export const HabitUnitSchema = z.enum(["count", "duration", "boolean"]);

export const HabitDefinitionSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)),
  unit: HabitUnitSchema,
  weeklyGoal: z.number().int().positive().optional(),
  category: z.string().trim().min(1).optional(),
});
