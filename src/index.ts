import { errorMessage } from '@utils/errors';
import { getBuildInfo } from '@utils/buildInfo';
import { logError, logInfo, logWarn, setLogLevel } from '@utils/logger';
import { loadOptions, type ServiceOptions } from '@utils/options';
import type { Application } from './Service/Application';
import { createApp } from './Service/createApp';

let app: Application | undefined;
let exiting = false;

const processExit = async (exitCode = 0) => {
  if (exiting) return;
  exiting = true;
  if (exitCode > 0) logError(`Exit code: ${exitCode}`);
  try {
    await app?.stop();
  } catch (error) {
    logError(`[Main] Error while stopping: ${errorMessage(error)}`);
  }
  process.exit(exitCode);
};

const requestExit = (exitCode?: number) => {
  processExit(exitCode).catch((error: unknown) => {
    logError(`[Main] ${errorMessage(error)}`);
    process.exit(exitCode ?? 1);
  });
};

process.on('exit', (code) => logWarn(`Shutting down... (code=${code})`));
process.on('SIGINT', () => requestExit(0));
process.on('SIGTERM', () => requestExit(0));
process.on('uncaughtException', (error) => {
  logError('[Main] Uncaught exception:', error);
  requestExit(2);
});
process.on('unhandledRejection', (reason: unknown) => {
  logError(`[Main] Unhandled promise rejection: ${errorMessage(reason)}`);
});

const start = async () => {
  let options: ServiceOptions;
  try {
    options = loadOptions();
  } catch {
    return requestExit(1);
  }
  if (options.debug) setLogLevel('debug');

  const build = getBuildInfo(options.name);
  logInfo(`[Build] name=${build.name} version=${build.version ?? 'unknown'} git=${build.gitSha} built=${build.buildTime}`);

  app = createApp(options);
  await app.start();
};

start().catch((error: unknown) => {
  logError(`[Main] Failed to start: ${errorMessage(error)}`);
  requestExit(1);
});
