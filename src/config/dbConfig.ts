/**
 * Database connection settings, resolved once at startup from the standard
 * libpq environment variables and passed down explicitly.
 */

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export const DB_ENV_VARS = {
  host: "PGHOST",
  port: "PGPORT",
  database: "PGDATABASE",
  user: "PGUSER",
  password: "PGPASSWORD",
} as const;

export const DEFAULT_DB_CONFIG: DbConfig = {
  host: "localhost",
  port: 5432,
  database: "postgres",
  user: "postgres",
  password: "postgres",
};

/**
 * Raised when an environment variable is present but unusable.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * Read a variable, treating absent and blank values alike
 */
function readVar(env: Env, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() !== "" ? value : undefined;
}

/**
 * Parse a TCP port. Only absent values fall back to the default;
 * anything present must be a valid port number.
 */
export function parsePort(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_DB_CONFIG.port;
  }

  const text = raw.trim();
  if (!/^\d+$/.test(text)) {
    throw new ConfigError(`${DB_ENV_VARS.port} must be an integer, got "${raw}"`);
  }

  const port = parseInt(text, 10);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`${DB_ENV_VARS.port} must be between 1 and 65535, got ${port}`);
  }
  return port;
}

/**
 * Build the connection settings from environment variables
 */
export function loadDbConfig(env: Env): DbConfig {
  return {
    host: readVar(env, DB_ENV_VARS.host) ?? DEFAULT_DB_CONFIG.host,
    port: parsePort(readVar(env, DB_ENV_VARS.port)),
    database: readVar(env, DB_ENV_VARS.database) ?? DEFAULT_DB_CONFIG.database,
    user: readVar(env, DB_ENV_VARS.user) ?? DEFAULT_DB_CONFIG.user,
    password: readVar(env, DB_ENV_VARS.password) ?? DEFAULT_DB_CONFIG.password,
  };
}
