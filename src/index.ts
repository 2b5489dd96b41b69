import 'dotenv/config';
import { loadConfig } from './config';
import { createRuntime } from './runtime';
import { createApp } from './app';

const config = loadConfig();
const runtime = createRuntime(config);
const app = createApp(runtime);

if (!config.sourceApiKey) {
  console.warn('SOURCE_API_KEY is not set; polling will fail until it is configured');
}

const server = app.listen(config.port, () => {
  console.log(`listening http://localhost:${config.port}`);
  if (config.autostartMonitor) runtime.scheduler.start();
});

async function shutdown(signal: string) {
  console.log(`${signal} received, shutting down`);
  runtime.scheduler.stop();
  server.close();
  await runtime.scheduler.idle();
  process.exit(0);
}

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((e) => {
    console.error(e);
    process.exit(1);
  });
});
process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((e) => {
    console.error(e);
    process.exit(1);
  });
});
