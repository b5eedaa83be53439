import { applySchema, createPool } from "../db/connection";
import { loadScriptEnv } from "./scriptEnv";

async function runMigration() {
  const { DATABASE_URL, NODE_ENV } = loadScriptEnv();
  if (!DATABASE_URL) {
    throw new Error("DATABASE_URL is required to run the migration");
  }

  console.log("🗄️  Running database migration...");
  const pool = createPool(DATABASE_URL, NODE_ENV);
  try {
    const count = await applySchema(pool);
    console.log(`✅ Database migration completed successfully (${count} statements)`);
  } finally {
    await pool.end();
  }
}

// Run migration if called directly
if (require.main === module) {
  runMigration()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error("❌ Migration failed:", error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
