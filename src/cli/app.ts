import { ConfigError, DbConfig, loadDbConfig } from "../config/dbConfig";
import { ConnectionFactory, openPgConnection } from "../db/connection";
import { initSchema } from "../db/schema";
import { StudentStore } from "../stores/studentStore";
import { ShellIO } from "./helpers";
import { runStudentShell } from "./studentShell";

/**
 * Resolve config, make sure the table exists, then hand over to the shell.
 * Returns the process exit code.
 */
export async function startApp(
  env: Record<string, string | undefined>,
  io: ShellIO,
  factory: ConnectionFactory = openPgConnection
): Promise<number> {
  let config: DbConfig;
  try {
    config = loadDbConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.log(`Initialization error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const schema = await initSchema(config, factory);
  if (!schema.ok) {
    io.log(`Initialization error: ${schema.error.message}`);
    return 1;
  }
  io.log("Database initialized");

  await runStudentShell(io, new StudentStore(config, factory));
  return 0;
}
