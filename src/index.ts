import 'dotenv/config';
import type { Server } from 'http';
import { env, isCookieSourceKind } from './config/env.js';
import { createApp } from './server/index.js';
import { createCookieSource } from './services/cookieSource.js';
import { FileCookieStore } from './services/cookieStore.js';
import { YtDlpExtractor } from './services/extractor.js';
import { MetadataService } from './services/metadata.js';
import { logger } from './utils/logger.js';

function buildService(): MetadataService {
  if (!isCookieSourceKind(env.COOKIE_SOURCE)) {
    throw new Error(`Unknown cookie source: ${env.COOKIE_SOURCE}`);
  }

  const source = createCookieSource(env.COOKIE_SOURCE, {
    entryUrl: env.COOKIE_ENTRY_URL,
    userAgent: env.USER_AGENT,
    timeoutMs: env.BROWSER_TIMEOUT * 1000,
    executablePath: env.BROWSER_EXECUTABLE_PATH,
  });

  const cookies = new FileCookieStore(source, {
    filePath: env.COOKIE_FILE,
    maxAgeMs: env.COOKIE_MAX_AGE * 1000,
    domain: env.COOKIE_DOMAIN,
    timeoutMs: env.BROWSER_TIMEOUT * 1000,
  });

  const extractor = new YtDlpExtractor({
    binary: env.YT_DLP_PATH,
    userAgent: env.USER_AGENT,
    timeoutMs: env.EXTRACT_TIMEOUT * 1000,
  });

  return new MetadataService(cookies, extractor, env.SUPPORTED_DOMAINS);
}

async function main(): Promise<void> {
  const app = createApp(buildService());

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(env.PORT, env.HOST, () => resolve(listening));
    listening.once('error', reject);
  });
  logger.info(`Listening on http://${env.HOST}:${env.PORT} (cookie source: ${env.COOKIE_SOURCE})`);

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down...`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing server', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Failed to start server', error);
  process.exit(1);
});
