/**
 * Production API Server
 * Wires the file-backed stores, the LLM client factory and the document renderer into the API
 */

import { resolve } from 'path';
import { pathFor, validatePathConfiguration } from '../config/paths.js';
import { SETTINGS } from '../config/settings.js';
import { FileDocumentStore } from '../content-engine/documents/src/index.js';
import { PipelineDeps } from '../content-engine/fsm/src/index.js';
import { FileJobStore } from '../content-engine/jobs/src/index.js';
import { copyrightTemplateLoader } from '../content-engine/prompts/src/index.js';
import { docxRenderer } from '../content-engine/rendering/src/index.js';
import { EnvCredentialsProvider } from '../content-engine/utils/credentials.js';
import { errorMessage } from '../content-engine/utils/errors.js';
import { LLMClient } from '../content-engine/utils/llm-client.js';
import { createConsoleLogger, maskSecret } from '../content-engine/utils/logger.js';
import { createMergeRunner, workspaceManager } from '../content-engine/workspace/src/index.js';
import { createGenerationHandlers } from './api/generation.js';
import { createApp } from './app.js';
import { ProjectLockManager } from './concurrency/lock-manager.js';
import { HealthEndpoints, HealthMonitor } from './monitoring/health-endpoints.js';
import { retryPolicyManager } from './resilience/retry-policies.js';
import { SecurityMiddleware } from './security/middleware.js';

const logger = createConsoleLogger('server', SETTINGS.LOG_LEVEL);
const pipelineLogger = createConsoleLogger('pipeline', SETTINGS.LOG_LEVEL);

const jobs = new FileJobStore({}, pipelineLogger);
const lockManager = new ProjectLockManager({}, logger);

const pipeline: PipelineDeps = {
  jobs,
  documents: new FileDocumentStore({}, pipelineLogger),
  renderer: docxRenderer,
  credentials: new EnvCredentialsProvider({
    apiKey: SETTINGS.LLM_API_KEY,
    baseUrl: SETTINGS.LLM_BASE_URL,
    model: SETTINGS.LLM_MODEL
  }),
  createClient: credentials =>
    LLMClient.fromCredentials(
      credentials,
      {
        maxAttempts: SETTINGS.LLM_MAX_ATTEMPTS,
        backoffStepMs: SETTINGS.LLM_BACKOFF_STEP_MS,
        timeoutMs: SETTINGS.LLM_TIMEOUT_MS
      },
      pipelineLogger
    ),
  templates: copyrightTemplateLoader,
  workspace: workspaceManager,
  merge: createMergeRunner(SETTINGS.MERGE_COMMAND, pipelineLogger),
  settings: {
    scheduleSlack: SETTINGS.SCHEDULE_SLACK,
    timeRepairAttempts: SETTINGS.TIME_REPAIR_ATTEMPTS,
    generatedDir: pathFor('GENERATED_DIR'),
    resourcesDir: pathFor('RESOURCES_DIR')
  },
  logger: pipelineLogger
};

const handlers = createGenerationHandlers({
  pipeline,
  locks: lockManager,
  longPoll: { maxWaitSeconds: SETTINGS.LONG_POLL_MAX_SECONDS },
  logger
});

const app = createApp({
  handlers,
  health: new HealthEndpoints(new HealthMonitor(lockManager, retryPolicyManager, SETTINGS.LLM_API_KEY !== '')),
  security: new SecurityMiddleware({}, logger),
  corsOrigin: SETTINGS.CORS_ORIGIN,
  onError: (message, data) => logger('error', message, data)
});

// Initialize infrastructure components
async function initializeInfrastructure(): Promise<void> {
  const pathCheck = validatePathConfiguration();
  if (!pathCheck.valid) {
    throw new Error(`Invalid path configuration: ${pathCheck.errors.join('; ')}`);
  }

  await lockManager.initialize();
  await lockManager.cleanup();
  logger('info', 'Infrastructure components initialized');
}

// Start server with initialization
async function startServer(): Promise<void> {
  try {
    await initializeInfrastructure();

    app.listen(SETTINGS.PORT, () => {
      logger('info', `API server running on http://localhost:${SETTINGS.PORT}`);
      logger('info', 'Configuration', {
        dataDir: resolve(pathFor('DATA_DIR')),
        model: SETTINGS.LLM_MODEL,
        apiKey: maskSecret(SETTINGS.LLM_API_KEY)
      });
    });
  } catch (error) {
    logger('error', 'Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void startServer();

export default app;
