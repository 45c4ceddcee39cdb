import { databaseConfigFromEnv } from "../src/config/env";
import { Database } from "../src/db/connection";
import { runMigrations } from "../src/db/migrate";

async function main(db: Database): Promise<void> {
  await runMigrations(db);

  await db.query("DROP SCHEMA IF EXISTS public CASCADE");
  await db.query("CREATE SCHEMA public");
  await db.query("GRANT ALL ON SCHEMA public TO public");

  const applied = await runMigrations(db);
  // eslint-disable-next-line no-console
  console.log(`Migration smoke (down/up) completed: ${applied.join(", ")}`);
}

const db = new Database(databaseConfigFromEnv());
main(db)
  .catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await db.close();
  });
