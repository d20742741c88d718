import path from 'path';
import Joi from 'joi';
import { readJSON } from '../storage/json-storage';
import { AppConfig, ServerConfig, TestTypesConfig } from '../models/config';
import logger from '../utils/logger';

const serverConfigSchema = Joi.object<ServerConfig>({
  api_port: Joi.number().integer().min(0).max(65535).required(),
  cors: Joi.object({
    enabled: Joi.boolean().required(),
    origins: Joi.array().items(Joi.string()).required(),
  }).optional(),
  rate_limit: Joi.object({
    window_ms: Joi.number().integer().min(1).required(),
    max_requests: Joi.number().integer().min(1).required(),
  }).optional(),
});

const testTypesSchema = Joi.object<TestTypesConfig>()
  .pattern(
    Joi.string(),
    Joi.object({
      prefix: Joi.string().pattern(/^TC_[A-Z]+$/).required(),
      description: Joi.string().required(),
      max_count: Joi.number().integer().min(1).required(),
      url_max_count: Joi.number().integer().min(1).required(),
    })
  )
  .min(1);

export function defaultConfigDir(): string {
  return process.env.CONFIG_DIR || path.join(process.cwd(), 'config');
}

function validateSection<T>(schema: Joi.ObjectSchema<T>, raw: unknown, file: string): T {
  const result = schema.validate(raw);
  if (result.error) {
    throw new Error(`Invalid configuration in ${file}: ${result.error.message}`);
  }
  return result.value;
}

export async function loadConfigurations(configDir: string = defaultConfigDir()): Promise<AppConfig> {
  logger.info('Loading configurations', { config_dir: configDir });

  const server = validateSection(
    serverConfigSchema,
    await readJSON<unknown>(path.join(configDir, 'server.json')),
    'server.json'
  );
  const testTypes = validateSection(
    testTypesSchema,
    await readJSON<unknown>(path.join(configDir, 'test-types.json')),
    'test-types.json'
  );

  logger.info('Configurations loaded successfully', { test_types: Object.keys(testTypes) });

  return { server, testTypes };
}
