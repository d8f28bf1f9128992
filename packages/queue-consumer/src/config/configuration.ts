export interface ConsumerConfig {
  nodeEnv: string;
  port: number;
  database: {
    host: string;
    port: number;
    name: string;
    user: string;
    password: string;
    poolSize: number;
  };
  redis: {
    host: string;
    port: number;
  };
  queue: {
    name: string;
    dequeueTimeoutSeconds: number;
    errorBackoffMs: number;
  };
  startup: {
    maxAttempts: number;
    retryDelayMs: number;
  };
}

function validateRange(
  value: number,
  min: number,
  max: number,
  name: string,
): void {
  if (Number.isNaN(value) || value < min || value > max) {
    throw new Error(`${name} must be between ${min} and ${max}`);
  }
}

export default (): ConsumerConfig => {
  const port = parseInt(process.env.PORT || "3001", 10);
  const postgresPort = parseInt(process.env.POSTGRES_PORT || "5432", 10);
  const poolSize = parseInt(process.env.DB_POOL_SIZE || "10", 10);
  const redisPort = parseInt(process.env.REDIS_PORT || "6379", 10);
  const dequeueTimeoutSeconds = parseInt(
    process.env.DEQUEUE_TIMEOUT_SECONDS || "5",
    10,
  );
  const errorBackoffMs = parseInt(process.env.ERROR_BACKOFF_MS || "1000", 10);
  const maxAttempts = parseInt(process.env.STARTUP_MAX_ATTEMPTS || "30", 10);
  const retryDelayMs = parseInt(
    process.env.STARTUP_RETRY_DELAY_MS || "2000",
    10,
  );

  validateRange(port, 1, 65535, "PORT");
  validateRange(postgresPort, 1, 65535, "POSTGRES_PORT");
  validateRange(poolSize, 1, 100, "DB_POOL_SIZE");
  validateRange(redisPort, 1, 65535, "REDIS_PORT");
  // BLPOP with 0 blocks forever, which would make shutdown hang
  validateRange(dequeueTimeoutSeconds, 1, 60, "DEQUEUE_TIMEOUT_SECONDS");
  validateRange(errorBackoffMs, 0, 60000, "ERROR_BACKOFF_MS");
  validateRange(maxAttempts, 1, 1000, "STARTUP_MAX_ATTEMPTS");
  validateRange(retryDelayMs, 0, 60000, "STARTUP_RETRY_DELAY_MS");

  return {
    nodeEnv: process.env.NODE_ENV || "development",
    port,
    database: {
      host: process.env.POSTGRES_HOST || "localhost",
      port: postgresPort,
      name: process.env.POSTGRES_DB || "sticker_collector",
      user: process.env.POSTGRES_USER || "bot_user",
      password: process.env.POSTGRES_PASSWORD || "password",
      poolSize,
    },
    redis: {
      host: process.env.REDIS_HOST || "localhost",
      port: redisPort,
    },
    queue: {
      name: process.env.QUEUE_NAME || "sticker_processing",
      dequeueTimeoutSeconds,
      errorBackoffMs,
    },
    startup: {
      maxAttempts,
      retryDelayMs,
    },
  };
};
