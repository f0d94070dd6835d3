import { readFile } from "node:fs/promises";
import type { Pool } from "pg";
import { z } from "zod";
import { MONSTER_COLUMNS } from "./facts/monsterTable";

export const MonsterRecordSchema = z.object({
  name: z.string().min(1),
  type: z.string().nullable().default(null),
  size: z.string().nullable().default(null),
  armor_class: z.number().int().nullable().default(null),
  hit_points: z.number().int().nullable().default(null),
  speed: z.string().nullable().default(null),
  challenge_rating: z.string().nullable().default(null),
  abilities: z.string().nullable().default(null),
  skills: z.string().nullable().default(null),
  damage_resistances: z.string().nullable().default(null),
  damage_immunities: z.string().nullable().default(null),
  condition_immunities: z.string().nullable().default(null),
  senses: z.string().nullable().default(null),
  languages: z.string().nullable().default(null),
  special_abilities: z.string().nullable().default(null),
  actions: z.string().nullable().default(null),
  legendary_actions: z.string().nullable().default(null),
  source: z.string().nullable().default(null)
});

export type MonsterRecord = z.infer<typeof MonsterRecordSchema>;

export function buildCreateTableStatement(tableName: string): string {
  const columns = MONSTER_COLUMNS.map(
    (column) => `  ${column.name} ${column.sqlType}${column.name === "name" ? " PRIMARY KEY" : ""}`
  );
  return `CREATE TABLE IF NOT EXISTS ${tableName} (\n${columns.join(",\n")}\n);`;
}

export async function init(pool: Pool, tableName: string): Promise<void> {
  await pool.query(buildCreateTableStatement(tableName));
}

export async function seedMonsters(pool: Pool, tableName: string, monsters: MonsterRecord[]): Promise<number> {
  const names = MONSTER_COLUMNS.map((column) => column.name);
  const placeholders = names.map((_name, index) => `$${index + 1}`).join(", ");
  const updates = names
    .filter((name) => name !== "name")
    .map((name) => `${name} = EXCLUDED.${name}`)
    .join(", ");

  const statement = `INSERT INTO ${tableName} (${names.join(", ")})
     VALUES (${placeholders})
     ON CONFLICT (name) DO UPDATE SET ${updates}`;

  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    for (const monster of monsters) {
      const row: Record<string, string | number | null> = monster;
      await client.query(
        statement,
        names.map((name) => row[name] ?? null)
      );
    }
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }

  return monsters.length;
}

export async function readMonsterFile(filePath: string): Promise<MonsterRecord[]> {
  const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
  const parsed = z.array(MonsterRecordSchema).safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid monster data in ${filePath}: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}
