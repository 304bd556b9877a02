import { z } from "zod";
import { normalizePhrase, type HabitDefinition, type HabitUnit } from "@habitvoice/interpreter";
import { RegistryError } from "../errors.js";
import { readTextIfExists, writeJsonAtomic } from "../storage/files.js";
import { habitSlug } from "./catalog.js";
import { HabitDefinitionSchema } from "./schema.js";

const RegistryFileSchema = z.object({
  version: z.literal(1),
  habits: z.array(HabitDefinitionSchema),
});

export interface NewHabit {
  name: string;
  id?: string;
  aliases?: string[];
  unit?: HabitUnit;
  weeklyGoal?: number;
  category?: string;
}

export type HabitPatch = Partial<Omit<HabitDefinition, "id">>;

function phrasesOf(habit: HabitDefinition): string[] {
  return [habit.name, ...habit.aliases].map(normalizePhrase).filter((p) => p.length > 0);
}

/**
 * Rejects duplicate ids and any name or alias claimed by two habits.
 */
export function assertConsistent(habits: HabitDefinition[]): void {
  const ids = new Set<string>();
  const owners = new Map<string, string>();

  for (const habit of habits) {
    if (ids.has(habit.id)) throw new RegistryError(`Duplicate habit id "${habit.id}"`);
    ids.add(habit.id);

    for (const phrase of phrasesOf(habit)) {
      const owner = owners.get(phrase);
      if (owner !== undefined && owner !== habit.id) {
        throw new RegistryError(`"${phrase}" is already used by habit "${owner}"`);
      }
      owners.set(phrase, habit.id);
    }
  }
}

function validated(habit: HabitDefinition): HabitDefinition {
  const parsed = HabitDefinitionSchema.safeParse(habit);
  if (!parsed.success) {
    throw new RegistryError(`Invalid habit "${habit.name}": ${parsed.error.issues.map((i) => i.message).join("; ")}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Habit definitions kept in one JSON file. Every change is written with a
 * tmp file and rename, so readers never see a half-written registry.
 */
export class HabitRegistryStore {
  private habits: HabitDefinition[] = [];
  private loaded = false;

  constructor(readonly filePath: string) {}

  /**
   * Reads the registry file. A missing file starts from `seed` (nothing is
   * written until the first change).
   */
  async load(options: { seed?: HabitDefinition[] } = {}): Promise<HabitDefinition[]> {
    const text = await readTextIfExists(this.filePath);

    if (text === null) {
      const seed = (options.seed ?? []).map((h) => validated({ ...h, aliases: [...h.aliases] }));
      assertConsistent(seed);
      this.habits = seed;
    } else {
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (err) {
        throw new RegistryError(`Registry file ${this.filePath} is not valid JSON`, err);
      }
      const parsed = RegistryFileSchema.safeParse(json);
      if (!parsed.success) {
        throw new RegistryError(`Registry file ${this.filePath} has the wrong shape`, parsed.error);
      }
      assertConsistent(parsed.data.habits);
      this.habits = parsed.data.habits;
    }

    this.loaded = true;
    return this.list();
  }

  list(): HabitDefinition[] {
    this.ensureLoaded();
    return this.habits.map((h) => ({ ...h, aliases: [...h.aliases] }));
  }

  /**
   * Looks a habit up by id, then by name or alias (case-insensitive).
   */
  get(idOrName: string): HabitDefinition | undefined {
    this.ensureLoaded();
    const byId = this.habits.find((h) => h.id === idOrName);
    if (byId) return { ...byId, aliases: [...byId.aliases] };

    const phrase = normalizePhrase(idOrName);
    const owner = this.habits.find((h) => phrasesOf(h).includes(phrase));
    return owner ? { ...owner, aliases: [...owner.aliases] } : undefined;
  }

  async add(input: NewHabit): Promise<HabitDefinition> {
    this.ensureLoaded();
    const habit = validated({
      id: input.id ?? habitSlug(input.name),
      name: input.name.trim(),
      aliases: input.aliases ?? [],
      unit: input.unit ?? "count",
      ...(input.weeklyGoal === undefined ? {} : { weeklyGoal: input.weeklyGoal }),
      ...(input.category === undefined ? {} : { category: input.category }),
    });

    const next = [...this.habits, habit];
    assertConsistent(next);
    await this.persist(next);
    return { ...habit, aliases: [...habit.aliases] };
  }

  async update(id: string, patch: HabitPatch): Promise<HabitDefinition> {
    this.ensureLoaded();
    const current = this.require(id);
    const habit = validated({ ...current, ...patch, id });

    const next = this.habits.map((h) => (h.id === id ? habit : h));
    assertConsistent(next);
    await this.persist(next);
    return { ...habit, aliases: [...habit.aliases] };
  }

  /**
   * @returns false when no habit has this id
   */
  async remove(id: string): Promise<boolean> {
    this.ensureLoaded();
    const next = this.habits.filter((h) => h.id !== id);
    if (next.length === this.habits.length) return false;
    await this.persist(next);
    return true;
  }

  async setWeeklyGoal(id: string, target: number): Promise<HabitDefinition> {
    if (!Number.isInteger(target) || target < 1) {
      throw new RegistryError(`Weekly goal must be a positive whole number, got ${target}`);
    }
    return this.update(id, { weeklyGoal: target });
  }

  private require(id: string): HabitDefinition {
    const habit = this.habits.find((h) => h.id === id);
    if (!habit) throw new RegistryError(`Unknown habit "${id}"`);
    return habit;
  }

  private ensureLoaded(): void {
    if (!this.loaded) throw new RegistryError("Registry used before load()");
  }

  private async persist(next: HabitDefinition[]): Promise<void> {
    await writeJsonAtomic(this.filePath, { version: 1, habits: next });
    this.habits = next;
  }
}
