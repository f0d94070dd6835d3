import { QueryExecutionError } from "../errors";
import type { RequestOptions, TabularEvidence } from "../types";

export const MONSTER_TABLE_LABEL = "D&D Monster Database";

export interface ColumnDefinition {
  name: string;
  sqlType: "TEXT" | "INTEGER";
  required?: boolean;
  description: string;
}

export const MONSTER_COLUMNS: ColumnDefinition[] = [
  { name: "name", sqlType: "TEXT", required: true, description: "Monster name" },
  { name: "type", sqlType: "TEXT", description: "Creature type (Dragon, Beast, Humanoid, etc.)" },
  { name: "size", sqlType: "TEXT", description: "Size category (Tiny, Small, Medium, Large, Huge, Gargantuan)" },
  { name: "armor_class", sqlType: "INTEGER", description: "Armor Class (AC)" },
  { name: "hit_points", sqlType: "INTEGER", description: "Average hit points" },
  { name: "speed", sqlType: "TEXT", description: "Movement speeds (walk, fly, swim, etc.)" },
  { name: "challenge_rating", sqlType: "TEXT", description: "Challenge Rating as text, e.g. '1/4', '17', '21'" },
  { name: "abilities", sqlType: "TEXT", description: "Ability scores formatted as text (STR, DEX, CON, INT, WIS, CHA)" },
  { name: "skills", sqlType: "TEXT", description: "Proficient skills and bonuses" },
  { name: "damage_resistances", sqlType: "TEXT", description: "Damage types the monster resists" },
  { name: "damage_immunities", sqlType: "TEXT", description: "Damage types the monster is immune to" },
  { name: "condition_immunities", sqlType: "TEXT", description: "Conditions the monster is immune to" },
  { name: "senses", sqlType: "TEXT", description: "Special senses (darkvision, blindsight, etc.)" },
  { name: "languages", sqlType: "TEXT", description: "Languages the monster can speak or understand" },
  { name: "special_abilities", sqlType: "TEXT", description: "Special traits or abilities" },
  { name: "actions", sqlType: "TEXT", description: "Actions the monster can take" },
  { name: "legendary_actions", sqlType: "TEXT", description: "Legendary actions, if any" },
  { name: "source", sqlType: "TEXT", description: "Source book or material" }
];

export function describeMonsterSchema(tableName: string): string {
  const lines = MONSTER_COLUMNS.map(
    (column) => `- ${column.name} (${column.sqlType}${column.required ? ", REQUIRED" : ""}): ${column.description}`
  );
  return [`Table: ${tableName}`, ...lines].join("\n");
}

/** Executes generated queries against the fact table. */
export interface FactTable {
  readonly label: string;
  readonly tableName: string;
  execute(queryText: string, options?: RequestOptions): Promise<TabularEvidence>;
}

export interface QueryableResult {
  rows: Array<Record<string, unknown>>;
  fields: Array<{ name: string }>;
}

/** The slice of `pg.Pool` the fact table relies on. */
export interface Queryable {
  query(text: string): Promise<QueryableResult>;
}

const WRITE_KEYWORDS = /\b(insert|update|delete|merge|drop|alter|create|truncate|grant|revoke|copy|vacuum|lock)\b/i;

/**
 * Accepts a single SELECT (or WITH ... SELECT) statement and returns it without
 * its trailing semicolon. String literals are ignored when scanning for
 * statement separators and write keywords.
 */
export function assertReadOnlyQuery(queryText: string): string {
  const statement = queryText.trim().replace(/;\s*$/, "").trim();
  if (!statement) {
    throw new QueryExecutionError("Query is empty");
  }

  const withoutLiterals = statement.replace(/'(?:[^']|'')*'/g, "''").replace(/"(?:[^"]|"")*"/g, '""');

  if (withoutLiterals.includes(";")) {
    throw new QueryExecutionError("Only a single statement may be executed");
  }
  if (!/^(select|with)\b/i.test(withoutLiterals)) {
    throw new QueryExecutionError("Only SELECT queries may be executed");
  }
  const forbidden = WRITE_KEYWORDS.exec(withoutLiterals);
  if (forbidden) {
    throw new QueryExecutionError(`Statement contains a forbidden keyword: ${forbidden[1].toUpperCase()}`);
  }

  return statement;
}

/** One row past the cap is fetched so truncation is visible without counting the full result. */
export function capRows(statement: string, maxRows: number): string {
  return `SELECT * FROM (${statement}) AS capped_rows LIMIT ${maxRows + 1}`;
}

export interface PostgresFactTableOptions {
  tableName: string;
  maxRows?: number;
  label?: string;
}

export class PostgresFactTable implements FactTable {
  readonly label: string;

  readonly tableName: string;

  private readonly maxRows: number;

  constructor(private readonly db: Queryable, { tableName, maxRows = 50, label = MONSTER_TABLE_LABEL }: PostgresFactTableOptions) {
    this.tableName = tableName;
    this.maxRows = maxRows;
    this.label = label;
  }

  async execute(queryText: string, options: RequestOptions = {}): Promise<TabularEvidence> {
    const statement = assertReadOnlyQuery(queryText);
    if (options.signal?.aborted) {
      throw new QueryExecutionError("Query was cancelled before execution");
    }

    let result: QueryableResult;
    try {
      result = await this.db.query(capRows(statement, this.maxRows));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new QueryExecutionError(message);
    }

    const rows = result.rows.slice(0, this.maxRows);
    return {
      columns: result.fields.map((field) => field.name),
      rows,
      rowCount: rows.length,
      truncated: result.rows.length > this.maxRows
    };
  }

  async ping(): Promise<void> {
    await this.db.query("SELECT 1");
  }
}
