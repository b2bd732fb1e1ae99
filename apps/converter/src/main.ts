// dotenv must be imported first so the logger sees LOG_* variables
import 'dotenv/config';

import { HARDCODED_CONFIG } from '@stake-converter/schemas';
import { closeAllLogs, flushAllLogs, logger, validateEnv } from '@stake-converter/utils';
import { RateCacheStrategy, createRedisClient, testRedisConnection } from '@stake-converter/cache';
import { RatesApiClient } from '@stake-converter/rates-client';
import { WebSocketStream } from './stream/websocket-stream';
import { RateCacheService } from './services/rate-cache.service';
import { RetryBuffer } from './services/retry-buffer';
import { MessageProcessor } from './services/message-processor.service';
import { ConnectionSupervisor } from './services/connection-supervisor.service';

async function start(): Promise<void> {
  logger.info('Starting stake converter...');

  const config = validateEnv();
  const { conversion, heartbeat, websocket } = HARDCODED_CONFIG;

  // Fail fast if Redis is unavailable
  const redis = createRedisClient(config);
  await testRedisConnection(redis);

  const rates = new RateCacheService(
    new RateCacheStrategy(redis, conversion.targetCurrency, config.CACHE_TTL_SECONDS),
    new RatesApiClient({
      baseUrl: config.RATES_API_URL,
      apiKey: config.RATES_API_KEY,
      timeoutMs: config.RATES_API_TIMEOUT_MS,
      baseCurrency: conversion.targetCurrency,
    })
  );

  const retryBuffer = new RetryBuffer({
    ttlMs: config.RETRY_MESSAGE_TTL_SECONDS * 1000,
    maxSize: config.RETRY_BUFFER_MAX_SIZE,
  });

  const processor = new MessageProcessor(rates, retryBuffer, {
    targetCurrency: conversion.targetCurrency,
    precision: conversion.precision,
  });

  const supervisor = new ConnectionSupervisor(
    () =>
      WebSocketStream.connect(config.REQUESTS_WS_URL, {
        closeTimeoutMs: websocket.closeTimeoutMs,
      }),
    processor,
    retryBuffer,
    {
      reconnectDelayMs: websocket.reconnectDelayMs,
      heartbeatIntervalMs: heartbeat.intervalMs,
      heartbeatTimeoutMultiple: heartbeat.timeoutMultiple,
      maxConsecutiveProcessingFailures: websocket.maxConsecutiveProcessingFailures,
    }
  );

  // Graceful shutdown
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down stake converter...');
    supervisor.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await supervisor.run();
  } finally {
    await redis.quit();
  }

  logger.info('Stake converter shut down successfully');
}

start()
  .then(async () => {
    await flushAllLogs();
    closeAllLogs();
    process.exit(0);
  })
  .catch(async (error: unknown) => {
    logger.exception(error, 'Fatal error, shutting down');
    await flushAllLogs();
    closeAllLogs();
    process.exit(1);
  });
