import dotenv from 'dotenv';
dotenv.config();
import { Server } from 'http';
import { AppConfig } from './models/config';
import { loadConfigurations } from './config/load-config';
import { createExpressApp, startExpressServer } from './api/server';
import { createLlmProvider, createFallbackProvider } from './llm/provider-factory';
import { jiraCredentialsFromEnv } from './integrations/jira-client';
import { azureSettingsFromEnv } from './integrations/azure-devops-client';
import { errorMessage } from './utils/errors';
import logger, { createContextLogger } from './utils/logger';

async function main(): Promise<void> {
  logger.info('Starting QA Test Case Studio');
  const contextLogger = createContextLogger({ step: 'startup' });

  try {
    const config = await loadConfigurations();

    validateEnvironment(config);

    const app = createExpressApp(config, {
      primary: createLlmProvider(),
      fallback: createFallbackProvider(),
      testTypes: config.testTypes,
    });

    const port = parseInt(process.env.PORT || '', 10) || config.server.api_port;
    const server = await startExpressServer(app, port);

    logger.info('Service started successfully', {
      version: process.env.npm_package_version || '1.0.0',
      port,
      node_env: process.env.NODE_ENV,
    });

    process.on('SIGTERM', () => gracefulShutdown(server));
    process.on('SIGINT', () => gracefulShutdown(server));
  } catch (error) {
    contextLogger.fatal('Fatal error during startup', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

function validateEnvironment(config: AppConfig): void {
  logger.info('Validating environment');

  const llmProvider = (process.env.LLM_PROVIDER || 'openai').toLowerCase();

  switch (llmProvider) {
    case 'openai':
      if (!process.env.OPENAI_API_KEY) {
        logger.warn('OPENAI_API_KEY is not set; generation will fall back to Ollama');
      }
      break;
    case 'openrouter':
      if (!process.env.OPENROUTER_API_KEY) {
        logger.warn('OPENROUTER_API_KEY is not set; generation will fall back to Ollama');
      }
      break;
    case 'ollama':
      logger.info('Using Ollama provider', { base_url: process.env.OLLAMA_BASE_URL || 'http://localhost:11434' });
      break;
    default:
      logger.warn('Unknown LLM provider specified, Ollama will be used', { provider: llmProvider });
  }

  if (!jiraCredentialsFromEnv()) {
    logger.warn('Jira credentials not configured; jira sources are unavailable');
  }
  if (!azureSettingsFromEnv()) {
    logger.warn('Azure DevOps settings not configured; azure sources are unavailable');
  }

  logger.info('Environment validated', {
    provider: llmProvider,
    fallback_provider: process.env.LLM_FALLBACK_PROVIDER || 'none',
    test_types: Object.keys(config.testTypes).length,
  });
}

function gracefulShutdown(server: Server): void {
  logger.info('Received shutdown signal, shutting down gracefully');

  server.close(error => {
    if (error) {
      logger.error('Error while closing server', { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

main().catch(error => {
  console.error('Fatal error during startup:', error);
  process.exit(1);
});
