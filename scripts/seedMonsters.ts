import path from "node:path";
import { loadConfig } from "../src/config/env";
import { createPool } from "../src/config/db";
import { init, readMonsterFile, seedMonsters } from "../src/db";

async function main() {
  const [fileArg] = process.argv.slice(2);
  const filePath = path.resolve(process.cwd(), fileArg ?? "data/monsters.json");

  const config = loadConfig();
  const pool = createPool(config.factTable.database, config.factTable.queryTimeoutMs);
  try {
    await init(pool, config.factTable.tableName);
    const monsters = await readMonsterFile(filePath);
    const count = await seedMonsters(pool, config.factTable.tableName, monsters);
    console.log(`Seeded ${count} monsters into ${config.factTable.tableName} from ${filePath}`);
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
