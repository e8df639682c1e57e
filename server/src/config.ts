import { parseArgs } from 'node:util';
import { z } from 'zod';
import { LOG_LEVELS } from '@nowplaying-bridge/shared';

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const PortSchema = z.coerce.number().int().min(1).max(65535);

/** Accepts a parsed flag (boolean) or an environment string */
const BooleanSchema = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((v) => v === 'true' || v === '1'),
]);

/** MQTT topic prefix: no trailing slash, no wildcards */
const TopicPrefixSchema = z
  .string()
  .min(1)
  .refine((prefix) => !prefix.endsWith('/'), 'must not end with "/"')
  .refine((prefix) => !/[#+]/.test(prefix), 'must not contain MQTT wildcards');

export const ConfigSchema = z.object({
  mqttHost: z.string().min(1).default('localhost'),
  mqttPort: PortSchema.default(1883),
  mqttUser: z.string().min(1).optional(),
  mqttPass: z.string().min(1).optional(),
  topicPrefix: TopicPrefixSchema.default('shairport-sync'),
  httpHost: z.string().min(1).default('0.0.0.0'),
  httpPort: PortSchema.default(5000),
  clearOnStop: BooleanSchema.default(false),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});
export type Config = z.infer<typeof ConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Command Line
// ─────────────────────────────────────────────────────────────────────────────

export const USAGE = `Usage: nowplaying-bridge [options]

Options (environment variable in brackets):
  --mqtt-host <host>      MQTT broker host [MQTT_HOST] (default: localhost)
  --mqtt-port <port>      MQTT broker port [MQTT_PORT] (default: 1883)
  --mqtt-user <user>      MQTT username [MQTT_USER]
  --mqtt-pass <pass>      MQTT password [MQTT_PASS]
  --topic-prefix <prefix> MQTT topic prefix [TOPIC_PREFIX] (default: shairport-sync)
  --http-host <host>      HTTP listen host [HTTP_HOST] (default: 0.0.0.0)
  --http-port <port>      HTTP listen port [HTTP_PORT] (default: 5000)
  --clear-on-stop         Clear track fields when playback ends [CLEAR_ON_STOP]
  --log-level <level>     debug | info | warn | error [LOG_LEVEL] (default: info)
  --debug                 Shorthand for --log-level debug
  -h, --help              Show this help`;

/**
 * Raised when flags or environment variables do not form a valid configuration.
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export type CommandLine = { help: true } | { help: false; config: Config };

/**
 * Reads an environment variable, treating empty strings as unset.
 */
function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parses command-line flags. Unknown flags and missing values throw.
 */
function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      'mqtt-host': { type: 'string' },
      'mqtt-port': { type: 'string' },
      'mqtt-user': { type: 'string' },
      'mqtt-pass': { type: 'string' },
      'topic-prefix': { type: 'string' },
      'http-host': { type: 'string' },
      'http-port': { type: 'string' },
      'clear-on-stop': { type: 'boolean' },
      'log-level': { type: 'string' },
      debug: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  }).values;
}

type Flags = ReturnType<typeof readFlags>;

/**
 * Builds the process configuration.
 * Flags take precedence over environment variables, which take precedence over defaults.
 * @param argv - Arguments after the script name
 * @param env - Environment variables
 * @returns The validated configuration, or a help request
 * @throws ConfigError on unknown flags or invalid values
 */
export function parseCommandLine(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): CommandLine {
  let values: Flags;
  try {
    values = readFlags(argv);
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err)]);
  }

  if (values.help) {
    return { help: true };
  }

  const result = ConfigSchema.safeParse({
    mqttHost: values['mqtt-host'] ?? envValue(env, 'MQTT_HOST'),
    mqttPort: values['mqtt-port'] ?? envValue(env, 'MQTT_PORT'),
    mqttUser: values['mqtt-user'] ?? envValue(env, 'MQTT_USER'),
    mqttPass: values['mqtt-pass'] ?? envValue(env, 'MQTT_PASS'),
    topicPrefix: values['topic-prefix'] ?? envValue(env, 'TOPIC_PREFIX'),
    httpHost: values['http-host'] ?? envValue(env, 'HTTP_HOST'),
    httpPort: values['http-port'] ?? envValue(env, 'HTTP_PORT'),
    clearOnStop: values['clear-on-stop'] ?? envValue(env, 'CLEAR_ON_STOP'),
    logLevel: values.debug ? 'debug' : (values['log-level'] ?? envValue(env, 'LOG_LEVEL')),
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return { help: false, config: result.data };
}
