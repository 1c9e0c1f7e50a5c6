import 'dotenv/config';
import path from 'path';
import { createApp } from './app.js';
import { loadConfiguration } from './services/config.js';
import { createWorkspace, ensureWorkspace } from './services/workspace.js';
import { checkReadiness } from './services/readiness.js';
import { JobStore } from './services/jobStore.js';
import { initQueue } from './services/queue.js';
import { ensureDirectories } from './utils/fsutil.js';
import { logger } from './utils/logger.js';
import type { Configuration } from './models/types.js';

const port = process.env.PORT ? Number(process.env.PORT) : 4000;
const dataDir = path.resolve(process.env.DATA_DIR ?? './data');
const configPath = path.resolve(process.env.WHISPERX_CONFIG ?? './config.env');

let config: Configuration = loadConfiguration(configPath);
const uploadDir = path.join(dataDir, 'uploads');
const workspace = createWorkspace(config, { inputDir: uploadDir, outputDir: path.join(dataDir, 'results') });

// Ensure runtime dirs
ensureWorkspace(workspace);
ensureDirectories([path.join(dataDir, 'jobs')]);

const store = new JobStore(path.join(dataDir, 'jobs'));

const readiness = async () => {
  const report = await checkReadiness(config, workspace);
  // Keep a GPU to CPU downgrade for the jobs that follow.
  config = report.configuration;
  return report;
};

const queue = initQueue({ store, workspace, config: () => config });
const app = createApp({ store, queue, workspace, uploadDir, config: () => config, readiness });

readiness().then(
  (report) => {
    if (!report.ready) logger.warn('Worker prerequisites missing; uploaded jobs will fail until fixed');
  },
  (err: unknown) => logger.error(`Readiness check failed: ${String(err)}`)
);

app.listen(port, () => {
  logger.info(`Server listening on http://localhost:${port}`);
});
