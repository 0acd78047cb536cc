/**
 * Broker configuration from environment variables.
 */

import { z } from 'zod';
import { BrokerConfig } from './types';

const BOOLEAN_FLAG = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const CONFIG_SCHEMA = z.object({
  RABBITMQ_HOST: z.string().min(1).default('localhost'),
  RABBITMQ_PORT: z.coerce.number().int().positive().default(5672),
  RABBITMQ_USERNAME: z.string().default('guest'),
  RABBITMQ_PASSWORD: z.string().default('guest'),
  RABBITMQ_VHOST: z.string().default('/'),
  RABBITMQ_TLS: BOOLEAN_FLAG,
});

/**
 * Validates broker settings from the given environment.
 *
 * @param env - Environment variables. Default: process.env.
 * @returns Broker configuration
 * @throws ZodError if a variable is malformed
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): BrokerConfig => {
  const parsed = CONFIG_SCHEMA.parse(env);

  return {
    host: parsed.RABBITMQ_HOST,
    port: parsed.RABBITMQ_PORT,
    username: parsed.RABBITMQ_USERNAME,
    password: parsed.RABBITMQ_PASSWORD,
    vhost: parsed.RABBITMQ_VHOST,
    tls: parsed.RABBITMQ_TLS,
  };
};

/**
 * Renders the connection URL amqplib expects.
 *
 * @param config - Broker configuration
 * @returns amqp:// or amqps:// URL
 */
export const buildUrl = (config: BrokerConfig): string => {
  const scheme = config.tls ? 'amqps' : 'amqp';
  const credentials = `${encodeURIComponent(config.username)}:${encodeURIComponent(config.password)}`;

  return `${scheme}://${credentials}@${config.host}:${config.port}/${encodeURIComponent(config.vhost)}`;
};
