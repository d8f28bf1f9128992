export interface BotConfig {
  nodeEnv: string;
  port: number;
  botToken: string;
  redis: {
    host: string;
    port: number;
  };
  queue: {
    name: string;
  };
  instructionVideoPath: string;
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

export default (): BotConfig => {
  const port = parseInt(process.env.PORT || "3000", 10);
  const redisPort = parseInt(process.env.REDIS_PORT || "6379", 10);

  validateRange(port, 1, 65535, "PORT");
  validateRange(redisPort, 1, 65535, "REDIS_PORT");

  return {
    nodeEnv: process.env.NODE_ENV || "development",
    port,
    botToken: process.env.BOT_TOKEN || "",
    redis: {
      host: process.env.REDIS_HOST || "localhost",
      port: redisPort,
    },
    queue: {
      name: process.env.QUEUE_NAME || "sticker_processing",
    },
    instructionVideoPath:
      process.env.INSTRUCTION_VIDEO_PATH || "media/instruction_video.mp4",
  };
};
