/**
 * Environment configuration
 * Loaded once from process.env (and .env through dotenv), validated with joi
 */

import dotenv from "dotenv";
import Joi from "joi";
import type { StoreDriver } from "../lib/store/poolStore.js";

dotenv.config();

export interface AppConfig {
  nodeEnv: string;
  port: number;
  jwtSecret: string;
  corsOrigins: string[];
  enableCompression: boolean;
  sentryDsn: string | null;
  store: {
    driver: StoreDriver;
    sqlitePath: string;
  };
  randomness: {
    secret: string;
    roundDurationMs: number;
    salt: string;
  };
  scheduler: {
    enabled: boolean;
    rewardsCron: string;
    healthCron: string;
    drawCron: string;
    batchSize: number;
  };
  defaultPool: {
    poolId: string | null;
    assetId: string;
    minimumDeposit: string;
    drawIntervalSeconds: number;
  };
}

interface EnvVars {
  NODE_ENV: string;
  PORT: number;
  JWT_SECRET: string;
  CORS_ORIGINS: string;
  ENABLE_COMPRESSION: boolean;
  SENTRY_DSN: string;
  STORE_DRIVER: StoreDriver;
  SQLITE_PATH: string;
  RANDOMNESS_SECRET: string;
  RANDOMNESS_ROUND_MS: number;
  RANDOMNESS_SALT: string;
  ENABLE_DRAW_SCHEDULER: boolean;
  REWARDS_CRON: string;
  HEALTH_CRON: string;
  DRAW_CRON: string;
  DRAW_BATCH_SIZE: number;
  DEFAULT_POOL_ID: string;
  DEFAULT_POOL_ASSET: string;
  DEFAULT_POOL_MIN_DEPOSIT: string;
  DEFAULT_POOL_DRAW_INTERVAL: number;
}

const envSchema = Joi.object<EnvVars>({
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),
  PORT: Joi.number().port().default(10000),
  JWT_SECRET: Joi.string().min(8).required().messages({
    "any.required": "JWT_SECRET is required",
  }),
  CORS_ORIGINS: Joi.string().allow("").default(""),
  ENABLE_COMPRESSION: Joi.boolean().default(true),
  SENTRY_DSN: Joi.string().uri().allow("").default(""),

  STORE_DRIVER: Joi.string().valid("memory", "sqlite").default("sqlite"),
  SQLITE_PATH: Joi.string().default("data/pools.db"),

  RANDOMNESS_SECRET: Joi.string().min(8).required().messages({
    "any.required": "RANDOMNESS_SECRET is required",
  }),
  RANDOMNESS_ROUND_MS: Joi.number().integer().min(1000).default(30000),
  RANDOMNESS_SALT: Joi.string().default("round"),

  ENABLE_DRAW_SCHEDULER: Joi.boolean().default(false),
  REWARDS_CRON: Joi.string().default("*/5 * * * *"),
  HEALTH_CRON: Joi.string().default("* * * * *"),
  DRAW_CRON: Joi.string().default("* * * * *"),
  DRAW_BATCH_SIZE: Joi.number().integer().min(1).default(500),

  DEFAULT_POOL_ID: Joi.string().allow("").default(""),
  DEFAULT_POOL_ASSET: Joi.string().default("USDC"),
  DEFAULT_POOL_MIN_DEPOSIT: Joi.string()
    .pattern(/^\d+(\.\d{1,8})?$/)
    .default("1.0"),
  DEFAULT_POOL_DRAW_INTERVAL: Joi.number().integer().min(0).default(604800),
}).unknown(true);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false });
  if (error) {
    throw new Error(`Invalid environment configuration: ${error.message}`);
  }

  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    jwtSecret: value.JWT_SECRET,
    corsOrigins: value.CORS_ORIGINS
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    enableCompression: value.ENABLE_COMPRESSION,
    sentryDsn: value.SENTRY_DSN || null,
    store: {
      driver: value.STORE_DRIVER,
      sqlitePath: value.SQLITE_PATH,
    },
    randomness: {
      secret: value.RANDOMNESS_SECRET,
      roundDurationMs: value.RANDOMNESS_ROUND_MS,
      salt: value.RANDOMNESS_SALT,
    },
    scheduler: {
      enabled: value.ENABLE_DRAW_SCHEDULER,
      rewardsCron: value.REWARDS_CRON,
      healthCron: value.HEALTH_CRON,
      drawCron: value.DRAW_CRON,
      batchSize: value.DRAW_BATCH_SIZE,
    },
    defaultPool: {
      poolId: value.DEFAULT_POOL_ID || null,
      assetId: value.DEFAULT_POOL_ASSET,
      minimumDeposit: value.DEFAULT_POOL_MIN_DEPOSIT,
      drawIntervalSeconds: value.DEFAULT_POOL_DRAW_INTERVAL,
    },
  };
}

export const config = loadConfig();
