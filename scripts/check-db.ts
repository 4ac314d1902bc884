import "dotenv/config";
import { loadConfig } from "../src/config";
import { createDb, ensureSchema } from "../src/db";
import { PgAllowListStore } from "../src/store/allowList";
import { PgLedgerStore } from "../src/store/ledger";

async function main() {
  const { db, pool } = createDb(loadConfig());
  try {
    await ensureSchema(db);
    const records = await new PgLedgerStore(db).count();
    const allowed = await new PgAllowListStore(db).list();
    console.log("Records in DB: ", records);
    console.log("Allowed users: ", allowed.length);
  } finally {
    await pool.end();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
