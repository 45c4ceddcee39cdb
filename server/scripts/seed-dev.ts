import { databaseConfigFromEnv } from "../src/config/env";
import { Database } from "../src/db/connection";
import { runMigrations } from "../src/db/migrate";
import { hashApiKey, newApiKey } from "../src/utils/crypto";

type IdRow = { id: string };

async function main(): Promise<void> {
  const db = new Database(databaseConfigFromEnv());

  try {
    await runMigrations(db);

    const deviceKey = newApiKey();
    const memberKey = newApiKey();

    const seeded = await db.withTransaction(async (client) => {
      const project = await client.query<IdRow>(
        "INSERT INTO projects (name) VALUES ($1) RETURNING id",
        ["Test Project"]
      );
      const projectId = project.rows[0].id;

      const membership = await client.query<IdRow>(
        "INSERT INTO project_memberships (project_id, email) VALUES ($1, $2) RETURNING id",
        [projectId, "test@example.com"]
      );
      const membershipId = membership.rows[0].id;

      const device = await client.query<IdRow>(
        "INSERT INTO devices (project_id, name) VALUES ($1, $2) RETURNING id",
        [projectId, "Test Device"]
      );
      const deviceId = device.rows[0].id;

      await client.query(
        "INSERT INTO device_api_keys (device_id, secret_hash) VALUES ($1, $2)",
        [deviceId, hashApiKey(deviceKey)]
      );
      await client.query(
        "INSERT INTO project_membership_api_keys (project_membership_id, secret_hash) VALUES ($1, $2)",
        [membershipId, hashApiKey(memberKey)]
      );

      return { projectId, deviceId };
    });

    // Raw keys are only ever shown here; the database keeps hashes.
    // eslint-disable-next-line no-console
    console.log(
      [
        "-------------------------------------------------",
        `Project id:                  ${seeded.projectId}`,
        `Device id:                   ${seeded.deviceId}`,
        `Device api key:              ${deviceKey}`,
        `Project membership api key:  ${memberKey}`
      ].join("\n")
    );
  } finally {
    await db.close();
  }
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
