import { readFileSync } from "node:fs";
import { z } from "zod";
import type { HabitDefinition } from "@habitvoice/interpreter";
import { HabitUnitSchema } from "./schema.js";

const CatalogFileSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().min(1),
      habits: z.array(
        z.object({
          name: z.string().min(1),
          aliases: z.array(z.string().min(1)),
          unit: HabitUnitSchema,
        }),
      ),
    }),
  ),
  popular: z.array(z.string().min(1)),
  defaultGoals: z.record(z.string(), z.number().int().positive()),
});

export interface HabitCategory {
  name: string;
  habitIds: string[];
}

export interface HabitCatalog {
  categories: HabitCategory[];
  habits: HabitDefinition[];

  /**
   * Ids suggested to newcomers, most popular first
   */
  popularHabitIds: string[];
}

export const OTHER_CATEGORY = "Other";

export function categoryOf(habit: HabitDefinition | undefined): string {
  return habit?.category ?? OTHER_CATEGORY;
}

/**
 * Lowercase, hyphen-separated id derived from a habit name.
 */
export function habitSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "");
}

let cached: HabitCatalog | undefined;

/**
 * Built-in habits, grouped by category, with their default weekly goals.
 */
export function loadDefaultCatalog(): HabitCatalog {
  if (cached) return cached;

  const raw: unknown = JSON.parse(readFileSync(new URL("../../data/catalog.json", import.meta.url), "utf-8"));
  const file = CatalogFileSchema.parse(raw);

  const habits: HabitDefinition[] = [];
  const categories = file.categories.map((category) => {
    const habitIds: string[] = [];
    for (const entry of category.habits) {
      const id = habitSlug(entry.name);
      const weeklyGoal = file.defaultGoals[entry.name];
      habits.push({
        id,
        name: entry.name,
        aliases: entry.aliases,
        unit: entry.unit,
        category: category.name,
        ...(weeklyGoal === undefined ? {} : { weeklyGoal }),
      });
      habitIds.push(id);
    }
    return { name: category.name, habitIds };
  });

  cached = { categories, habits, popularHabitIds: file.popular.map(habitSlug) };
  return cached;
}

export function findCatalogHabit(phrase: string): HabitDefinition | undefined {
  const slug = habitSlug(phrase);
  return loadDefaultCatalog().habits.find((h) => h.id === slug);
}
