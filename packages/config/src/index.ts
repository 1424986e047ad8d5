import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const environmentSchema = z.enum(['development', 'test', 'staging', 'production']).default('development');

const botSchema = z.object({
  NODE_ENV: environmentSchema,
  OTLP_ENDPOINT: z.string().url().optional(),
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  LAVALINK_NODES: z.string().optional(),
  LAVALINK_HOST: z.string().default('lavalink'),
  LAVALINK_PORT: z.coerce.number().int().positive().default(2333),
  LAVALINK_PASSWORD: z.string().min(1, 'LAVALINK_PASSWORD is required'),
  LAVALINK_ID: z.string().default('primary'),
  LAVALINK_SECURE: z.string().optional(),
  LAVALINK_CLIENT_NAME: z.string().default('CadenceBot'),
  PLAYER_CONNECT_TIMEOUT_SECONDS: z.coerce.number().positive().default(5),
  PLAYER_SELF_DEAF: z.string().optional(),
});

type BotEnv = z.infer<typeof botSchema>;

const rawNodeSchema = z
  .object({
    id: z.unknown(),
    host: z.unknown(),
    port: z.unknown(),
    password: z.unknown(),
    secure: z.unknown(),
  })
  .partial();

export interface LavalinkNodeConfig {
  id: string;
  host: string;
  port: number;
  password: string;
  secure: boolean;
}

export interface BotConfig {
  environment: BotEnv['NODE_ENV'];
  discordToken: string;
  otlpEndpoint?: string;
  lavalink: {
    nodes: LavalinkNodeConfig[];
    clientName: string;
  };
  player: {
    connectTimeoutSeconds: number;
    selfDeaf: boolean;
  };
}

export function loadBotConfig(source: NodeJS.ProcessEnv = process.env): BotConfig {
  const env = botSchema.parse(source);
  return {
    environment: env.NODE_ENV,
    discordToken: env.DISCORD_TOKEN,
    otlpEndpoint: env.OTLP_ENDPOINT,
    lavalink: {
      nodes: parseLavalinkNodes(env),
      clientName: env.LAVALINK_CLIENT_NAME,
    },
    player: {
      connectTimeoutSeconds: env.PLAYER_CONNECT_TIMEOUT_SECONDS,
      selfDeaf: normaliseBoolean(env.PLAYER_SELF_DEAF, true),
    },
  };
}

function parseLavalinkNodes(env: BotEnv): LavalinkNodeConfig[] {
  if (typeof env.LAVALINK_NODES === 'string' && env.LAVALINK_NODES.trim().length > 0) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(env.LAVALINK_NODES);
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse LAVALINK_NODES: ${reason}`);
    }

    const nodes = z.array(rawNodeSchema).safeParse(parsed);
    if (!nodes.success) {
      throw new Error('Failed to parse LAVALINK_NODES: expected a JSON array of node objects');
    }

    return nodes.data.map((node, index) => ({
      id: normaliseString(node.id, `node-${index + 1}`),
      host: normaliseString(node.host, env.LAVALINK_HOST),
      port: normalisePort(node.port, env.LAVALINK_PORT),
      password: normaliseString(node.password, env.LAVALINK_PASSWORD),
      secure: normaliseBoolean(node.secure, env.LAVALINK_SECURE),
    }));
  }

  return [
    {
      id: env.LAVALINK_ID,
      host: env.LAVALINK_HOST,
      port: env.LAVALINK_PORT,
      password: env.LAVALINK_PASSWORD,
      secure: normaliseBoolean(undefined, env.LAVALINK_SECURE),
    },
  ];
}

function normaliseString(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  if (fallback.trim().length > 0) {
    return fallback.trim();
  }
  throw new Error('Expected non-empty string');
}

function normalisePort(value: unknown, fallback: number): number {
  const candidate = typeof value === 'number' ? value : Number(value);
  if (Number.isInteger(candidate) && candidate > 0 && candidate < 65536) {
    return candidate;
  }
  if (Number.isInteger(fallback) && fallback > 0 && fallback < 65536) {
    return fallback;
  }
  throw new Error('Invalid Lavalink port');
}

function normaliseBoolean(value: unknown, fallback: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const normalised = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'y', 'on'].includes(normalised)) {
      return true;
    }
    if (['0', 'false', 'no', 'n', 'off'].includes(normalised)) {
      return false;
    }
  }

  if (typeof fallback === 'boolean') {
    return fallback;
  }
  if (typeof fallback === 'string' && fallback.trim().length > 0) {
    return normaliseBoolean(fallback, undefined);
  }
  return false;
}
