export interface ConnectionAddress {
  host: string;
  port: number;
}

export interface ConnectionConfig extends ConnectionAddress {
  /** Bound on one write + receive round trip. */
  timeoutMs: number;
  connectTimeoutMs: number;
  chunkSize: number;
  /** Command used to probe a cached connection, or null to skip the probe. */
  healthCheckCommand: string | null;
}

export interface ParsedConnectionConfig {
  config: ConnectionConfig;
  error?: string;
}

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 9876;

// Matches the add-on's own per-command processing timeout.
export const DEFAULT_TIMEOUT_MS = 180_000;

export const DEFAULT_CONNECTION_CONFIG: ConnectionConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  connectTimeoutMs: 10_000,
  chunkSize: 8192,
  healthCheckCommand: "get_polyhaven_status",
};

function parsePositiveNumber(value: string): number | null {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return parsed;
}

export function resolveConnectionConfig(env: NodeJS.ProcessEnv = process.env): ParsedConnectionConfig {
  const config: ConnectionConfig = {
    ...DEFAULT_CONNECTION_CONFIG,
  };
  const errors: string[] = [];

  const host = env.BLENDER_HOST?.trim();
  if (host) config.host = host;

  if (env.BLENDER_PORT) {
    const port = Number(env.BLENDER_PORT);
    if (Number.isInteger(port) && port > 0 && port <= 65535) {
      config.port = port;
    } else {
      errors.push(`Invalid BLENDER_PORT value "${env.BLENDER_PORT}".`);
    }
  }

  if (env.BLENDER_TIMEOUT_MS) {
    const timeoutMs = parsePositiveNumber(env.BLENDER_TIMEOUT_MS);
    if (timeoutMs === null) {
      errors.push(`Invalid BLENDER_TIMEOUT_MS value "${env.BLENDER_TIMEOUT_MS}".`);
    } else {
      config.timeoutMs = timeoutMs;
    }
  }

  if (env.BLENDER_CONNECT_TIMEOUT_MS) {
    const connectTimeoutMs = parsePositiveNumber(env.BLENDER_CONNECT_TIMEOUT_MS);
    if (connectTimeoutMs === null) {
      errors.push(`Invalid BLENDER_CONNECT_TIMEOUT_MS value "${env.BLENDER_CONNECT_TIMEOUT_MS}".`);
    } else {
      config.connectTimeoutMs = connectTimeoutMs;
    }
  }

  const healthCheck = env.BLENDER_HEALTH_CHECK?.trim();
  if (healthCheck) {
    config.healthCheckCommand = healthCheck === "off" ? null : healthCheck;
  }

  if (errors.length > 0) {
    return { config, error: errors.join(" ") };
  }
  return { config };
}
