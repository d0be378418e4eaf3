/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Mesh Light Bridge configuration covering:
 * - HTTP server settings
 * - MQTT broker connection
 * - Gateway topic namespace
 */
import { z } from "zod";

/**
 * Optional string - empty string becomes undefined.
 * `.env` files commonly carry `KEY=` for unset values.
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8084).describe("HTTP server port"),
  HOST: z.string().default("0.0.0.0").describe("HTTP bind address"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("MeshLightBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // MQTT Broker
  // ==========================================================================
  MQTT_HOST: z.string().min(1).default("localhost").describe("MQTT broker host"),
  MQTT_PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(1883)
    .describe("MQTT broker port"),
  MQTT_USERNAME: optionalString.describe("MQTT username"),
  MQTT_PASSWORD: optionalString.describe("MQTT password"),
  MQTT_CLIENT_ID: optionalString.describe("MQTT client id (random if unset)"),
  MQTT_CONNECT_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(30000)
    .describe("Connect timeout enforced by the MQTT client (ms)"),
  MQTT_KEEPALIVE_SECONDS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(60)
    .describe("MQTT keepalive interval (s)"),
  MQTT_RECONNECT_PERIOD_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000)
    .describe("Delay between reconnect attempts after a dropped connection (ms)"),

  // ==========================================================================
  // Gateway
  // ==========================================================================
  GATEWAY_TOPIC: z
    .string()
    .min(1, "GATEWAY_TOPIC must not be empty")
    .default("haefele/gateway")
    .describe("Root topic the gateway publishes under"),
  ENTRY_ID: optionalString.describe(
    "Prefix for entity unique ids (defaults to <MQTT_HOST>_<GATEWAY_TOPIC>)",
  ),
  INBOX_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(1000)
    .describe("Maximum queued inbound MQTT messages"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT credentials.
 * Returns null unless both username and password are configured.
 */
export function getMqttCredentials(): Readonly<{
  username: string;
  password: string;
}> | null {
  if (!config.MQTT_USERNAME || !config.MQTT_PASSWORD) {
    return null;
  }

  return {
    username: config.MQTT_USERNAME,
    password: config.MQTT_PASSWORD,
  };
}

/**
 * Coordinator settings derived from the environment.
 */
export function getMeshConfig(): Readonly<{
  gatewayTopic: string;
  clientId: string | undefined;
  connectTimeoutMs: number;
  keepaliveSeconds: number;
  reconnectPeriodMs: number;
  inboxCapacity: number;
}> {
  return {
    gatewayTopic: config.GATEWAY_TOPIC,
    clientId: config.MQTT_CLIENT_ID,
    connectTimeoutMs: config.MQTT_CONNECT_TIMEOUT_MS,
    keepaliveSeconds: config.MQTT_KEEPALIVE_SECONDS,
    reconnectPeriodMs: config.MQTT_RECONNECT_PERIOD_MS,
    inboxCapacity: config.INBOX_CAPACITY,
  };
}

/**
 * Prefix shared by all entity unique ids.
 */
export function getEntryId(): string {
  return config.ENTRY_ID ?? `${config.MQTT_HOST}_${config.GATEWAY_TOPIC}`;
}
