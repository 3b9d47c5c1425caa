import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors';

const seconds = z.number().positive();
const fraction = z.number().gt(0).lte(1);

export const ConfigSchema = z
  .object({
    exchange: z.object({
      id: z.string().default('binance'),
      testnet: z.boolean().default(true),
      paper: z.boolean().default(true),
    }).default({}),
    api: z.object({
      key: z.string().default(''),
      secret: z.string().default(''),
    }).default({}),
    telegram: z
      .object({
        botToken: z.string().min(1),
        chatId: z.string().min(1),
        allowedUsers: z.array(z.string()).default([]),
      })
      .optional(),
    tradingPairs: z.array(z.string()).min(1),
    initialCapital: z.number().positive(),
    rebalanceThreshold: fraction,
    /** Health-check interval of the supervisor, in seconds. */
    monitoringInterval: seconds,
    riskManagement: z.object({
      riskTolerance: fraction,
      maxPositionSize: z.number().positive(),
      maxDrawdown: fraction,
      maxPositions: z.number().int().positive().default(5),
      maxTotalExposure: z.number().positive().default(1),
      defaultWinRate: fraction.default(0.55),
      minTradesForStats: z.number().int().nonnegative().default(20),
      stopAtrMultiplier: z.number().positive().default(3),
      takeProfitAtrMultiplier: z.number().positive().default(5),
      varConfidence: z.number().gt(0.5).lt(1).default(0.95),
      /** Seconds a published decision counts against the guards before its entry fills. */
      pendingDecisionTtl: seconds.default(120),
    }),
    analysis: z.object({
      minConfidence: z.number().min(0).max(1),
      timeframe: z.string().default('1m'),
      candleLimit: z.number().int().positive().default(100),
      rsiPeriod: z.number().int().positive().default(14),
      atrPeriod: z.number().int().positive().default(14),
      rsiOversold: z.number().default(30),
      rsiOverbought: z.number().default(70),
    }),
    execution: z.object({
      retryAttempts: z.number().int().positive(),
      /** Seconds between attempts. */
      retryDelay: z.number().nonnegative(),
      monitorInterval: seconds.default(5),
      closedBracketHistory: z.number().int().positive().default(200),
    }),
    dataCollection: z
      .object({
        updateInterval: seconds.default(60),
      })
      .default({}),
    portfolio: z
      .object({
        updateInterval: seconds.default(60),
        tradeHistorySize: z.number().int().positive().default(1000),
      })
      .default({}),
    supervisor: z
      .object({
        statusInterval: seconds.default(4 * 60 * 60),
        stopTimeout: seconds.default(10),
      })
      .default({}),
    bus: z
      .object({
        transport: z.enum(['local', 'websocket']).default('local'),
        url: z.string().default('ws://127.0.0.1:7070'),
        port: z.number().int().positive().default(7070),
        historySize: z.number().int().positive().default(1000),
        reconnectDelay: seconds.default(5),
        maxReconnectAttempts: z.number().int().positive().default(10),
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (!config.exchange.paper && (!config.api.key || !config.api.secret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['api'],
        message: 'Live trading requires api.key and api.secret',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export interface LoadConfigOptions {
  /** Defaults to $CONFIG_PATH, then ./config/config.json. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Read .env from the working directory into process.env (default: only when env is not given). */
  dotenv?: boolean;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: JsonObject, key: string): JsonObject {
  const existing = root[key];
  if (isObject(existing)) {
    return existing;
  }
  const created: JsonObject = {};
  root[key] = created;
  return created;
}

function applyEnv(raw: JsonObject, env: NodeJS.ProcessEnv): void {
  if (env.EXCHANGE_ID) section(raw, 'exchange').id = env.EXCHANGE_ID;
  if (env.EXCHANGE_TESTNET) section(raw, 'exchange').testnet = env.EXCHANGE_TESTNET === 'true';
  if (env.PAPER_TRADING) section(raw, 'exchange').paper = env.PAPER_TRADING === 'true';
  if (env.API_KEY) section(raw, 'api').key = env.API_KEY;
  if (env.API_SECRET) section(raw, 'api').secret = env.API_SECRET;
  if (env.LOG_LEVEL) section(raw, 'logging').level = env.LOG_LEVEL;
  if (env.BUS_URL) {
    const bus = section(raw, 'bus');
    bus.url = env.BUS_URL;
    bus.transport = 'websocket';
  }

  if (env.TELEGRAM_BOT_TOKEN || env.TELEGRAM_CHAT_ID) {
    const telegram = section(raw, 'telegram');
    if (env.TELEGRAM_BOT_TOKEN) telegram.botToken = env.TELEGRAM_BOT_TOKEN;
    if (env.TELEGRAM_CHAT_ID) telegram.chatId = env.TELEGRAM_CHAT_ID;
    if (env.ALLOWED_USERS) {
      telegram.allowedUsers = env.ALLOWED_USERS.split(',').map((u) => u.trim()).filter(Boolean);
    }
  }
}

/**
 * Validates a raw configuration object. Throws ConfigError listing every
 * issue; there is no partial or best-guess result.
 */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }
  return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  if (options.dotenv ?? options.env === undefined) {
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
  }
  const env = options.env ?? process.env;

  const configPath = path.resolve(
    process.cwd(),
    options.path ?? env.CONFIG_PATH ?? path.join('config', 'config.json'),
  );

  if (!fs.existsSync(configPath)) {
    throw new ConfigError([`configuration file not found: ${configPath}`]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`cannot parse ${configPath}: ${message}`]);
  }

  if (!isObject(raw)) {
    throw new ConfigError([`${configPath} must contain a JSON object`]);
  }

  applyEnv(raw, env);
  return parseConfig(raw);
}
