import { Test, TestingModule } from "@nestjs/testing";
import { HealthCheckError } from "@nestjs/terminus";
import { ConsumerService } from "../../consumer.service";
import { DatabaseService } from "../../database/database.service";
import { RedisService } from "../../redis/redis.service";
import { ConsumerHealthIndicator } from "./consumer.health";
import { DatabaseHealthIndicator } from "./database.health";
import { RedisHealthIndicator } from "./redis.health";

describe("Health indicators", () => {
  let redisHealth: RedisHealthIndicator;
  let databaseHealth: DatabaseHealthIndicator;
  let consumerHealth: ConsumerHealthIndicator;
  let redisService: { ping: jest.Mock };
  let databaseService: { ping: jest.Mock };
  let consumerService: { isRunning: jest.Mock; getStats: jest.Mock };

  const stats = {
    recorded: 4,
    already_recorded: 1,
    duplicate: 0,
    malformed: 2,
    failed: 0,
  };

  beforeEach(async () => {
    redisService = { ping: jest.fn().mockResolvedValue(true) };
    databaseService = { ping: jest.fn().mockResolvedValue(true) };
    consumerService = {
      isRunning: jest.fn().mockReturnValue(true),
      getStats: jest.fn().mockReturnValue(stats),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RedisHealthIndicator,
        DatabaseHealthIndicator,
        ConsumerHealthIndicator,
        { provide: RedisService, useValue: redisService },
        { provide: DatabaseService, useValue: databaseService },
        { provide: ConsumerService, useValue: consumerService },
      ],
    }).compile();

    redisHealth = module.get(RedisHealthIndicator);
    databaseHealth = module.get(DatabaseHealthIndicator);
    consumerHealth = module.get(ConsumerHealthIndicator);
  });

  describe("RedisHealthIndicator", () => {
    it("should report up when PING succeeds", async () => {
      await expect(redisHealth.isHealthy("redis")).resolves.toEqual({
        redis: { status: "up" },
      });
    });

    it("should throw HealthCheckError when PING fails", async () => {
      redisService.ping.mockResolvedValue(false);

      await expect(redisHealth.isHealthy("redis")).rejects.toThrow(
        HealthCheckError,
      );
    });

    it("should carry the error message in the down status", async () => {
      redisService.ping.mockRejectedValue(new Error("Connection refused"));

      const error: unknown = await redisHealth
        .isHealthy("redis")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HealthCheckError);
      if (error instanceof HealthCheckError) {
        expect(error.message).toBe("Redis check failed: Connection refused");
        expect(error.causes).toEqual({
          redis: { status: "down", message: "Connection refused" },
        });
      }
    });
  });

  describe("DatabaseHealthIndicator", () => {
    it("should report up when SELECT 1 succeeds", async () => {
      await expect(databaseHealth.isHealthy("postgres")).resolves.toEqual({
        postgres: { status: "up" },
      });
    });

    it("should report down when PostgreSQL does not answer", async () => {
      databaseService.ping.mockResolvedValue(false);

      await expect(databaseHealth.isHealthy("postgres")).rejects.toThrow(
        "PostgreSQL check failed: PostgreSQL did not answer SELECT 1",
      );
    });
  });

  describe("ConsumerHealthIndicator", () => {
    it("should expose processing statistics while running", () => {
      expect(consumerHealth.isHealthy("consumer")).toEqual({
        consumer: { status: "up", processed: stats },
      });
    });

    it("should throw once the loop has stopped", () => {
      consumerService.isRunning.mockReturnValue(false);

      expect(() => consumerHealth.isHealthy("consumer")).toThrow(
        "Consumer loop is not running",
      );
    });
  });
});
