import { Test, TestingModule } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { ConsumerService } from "./consumer.service";
import { RedisService } from "./redis/redis.service";
import { ErrorClassifierService, DependencyUnavailableError } from "./errors";
import { DependencyWaiterService } from "./startup/dependency-waiter.service";
import { SubmissionService } from "./submissions/submission.service";
import { SubmissionStore } from "./submissions/submission.store";
import { InMemorySubmissionStore } from "../test/utils/in-memory-submission.store";
import { serializeEnvelope } from "../test/fixtures/envelopes";

function emptyQueue(): Promise<null> {
  return new Promise((resolve) => setImmediate(() => resolve(null)));
}

describe("ConsumerService", () => {
  let service: ConsumerService;
  let store: InMemorySubmissionStore;
  let redis: { dequeueBlocking: jest.Mock };
  let dependencyWaiter: { waitForDependencies: jest.Mock };

  const queueConfig = {
    name: "sticker_processing",
    dequeueTimeoutSeconds: 5,
    errorBackoffMs: 0,
  };

  beforeEach(async () => {
    store = new InMemorySubmissionStore();
    // An empty queue resolves on a later turn of the event loop, as BLPOP would
    redis = {
      dequeueBlocking: jest.fn().mockImplementation(emptyQueue),
    };
    dependencyWaiter = {
      waitForDependencies: jest.fn().mockResolvedValue(undefined),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConsumerService,
        SubmissionService,
        ErrorClassifierService,
        { provide: SubmissionStore, useValue: store },
        { provide: RedisService, useValue: redis },
        { provide: DependencyWaiterService, useValue: dependencyWaiter },
        {
          provide: ConfigService,
          useValue: {
            getOrThrow: jest.fn((key: string) => {
              if (key === "queue") {
                return queueConfig;
              }
              throw new Error(`Unexpected config key ${key}`);
            }),
          },
        },
      ],
    }).compile();

    service = module.get<ConsumerService>(ConsumerService);
  });

  afterEach(async () => {
    await service.stop();
  });

  it("should be defined", () => {
    expect(service).toBeDefined();
  });

  describe("pollOnce", () => {
    it("should block on the configured queue with the configured timeout", async () => {
      await service.pollOnce();

      expect(redis.dequeueBlocking).toHaveBeenCalledWith("sticker_processing", 5);
    });

    it("should report idle when the dequeue times out", async () => {
      await expect(service.pollOnce()).resolves.toEqual({ status: "idle" });
      expect(store.commits).toBe(0);
    });

    it("should record a dequeued envelope", async () => {
      redis.dequeueBlocking.mockResolvedValueOnce(serializeEnvelope());

      const result = await service.pollOnce();

      expect(result.status).toBe("recorded");
      expect(store.packs).toHaveLength(1);
      expect(store.submissions).toHaveLength(1);
      expect(service.getStats().recorded).toBe(1);
    });

    it("should report a transport error without throwing", async () => {
      redis.dequeueBlocking.mockRejectedValueOnce(
        Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:6379"), {
          code: "ECONNREFUSED",
        }),
      );

      await expect(service.pollOnce()).resolves.toEqual({
        status: "transport_error",
        reason: "Connection refused (ECONNREFUSED)",
      });
    });
  });

  describe("handlePayload", () => {
    it("should discard a non-JSON payload", async () => {
      const outcome = await service.handlePayload("{not json");

      expect(outcome.status).toBe("malformed");
      expect(store.commits + store.rollbacks).toBe(0);
    });

    it("should discard an envelope missing required fields", async () => {
      const outcome = await service.handlePayload(
        JSON.stringify({ short_name: "abc123", user_id: 555 }),
      );

      expect(outcome.status).toBe("malformed");
      expect(store.packs).toHaveLength(0);
    });
  });

  describe("malformed payload resilience", () => {
    it("should process the valid payload that follows a malformed one", async () => {
      redis.dequeueBlocking
        .mockResolvedValueOnce("garbage")
        .mockResolvedValueOnce(serializeEnvelope());

      const first = await service.pollOnce();
      const second = await service.pollOnce();

      expect(first.status).toBe("malformed");
      expect(second.status).toBe("recorded");
      expect(service.getStats()).toEqual({
        recorded: 1,
        already_recorded: 0,
        duplicate: 0,
        malformed: 1,
        failed: 0,
      });
    });
  });

  describe("failure isolation", () => {
    it("should continue after an item whose transaction fails", async () => {
      store.failNextCommitWith = new Error("could not serialize access");
      redis.dequeueBlocking
        .mockResolvedValueOnce(serializeEnvelope())
        .mockResolvedValueOnce(serializeEnvelope({ user_id: 777 }));

      const first = await service.pollOnce();
      const second = await service.pollOnce();

      expect(first.status).toBe("failed");
      expect(second.status).toBe("recorded");
      expect(store.submissions.map((s) => s.userId)).toEqual([777]);
    });
  });

  describe("loop lifecycle", () => {
    it("should wait for dependencies before starting the loop", async () => {
      await service.onApplicationBootstrap();

      expect(dependencyWaiter.waitForDependencies).toHaveBeenCalledTimes(1);
      expect(service.isRunning()).toBe(true);
    });

    it("should not start when a dependency never comes up", async () => {
      dependencyWaiter.waitForDependencies.mockRejectedValue(
        new DependencyUnavailableError("Redis", 30),
      );

      await expect(service.onApplicationBootstrap()).rejects.toThrow(
        "Redis is not available after 30 attempts",
      );
      expect(service.isRunning()).toBe(false);
      expect(redis.dequeueBlocking).not.toHaveBeenCalled();
    });

    it("should drain queued items and stop between iterations", async () => {
      const payloads = [
        serializeEnvelope(),
        "not json",
        serializeEnvelope(),
        serializeEnvelope({ user_id: 777 }),
      ];
      let drained: () => void = () => undefined;
      const allDelivered = new Promise<void>((resolve) => {
        drained = resolve;
      });
      redis.dequeueBlocking.mockImplementation(async () => {
        const next = payloads.shift();
        if (next === undefined) {
          drained();
          return emptyQueue();
        }
        return next;
      });

      service.start();
      await allDelivered;
      await service.stop();

      expect(service.isRunning()).toBe(false);
      expect(service.getStats()).toEqual({
        recorded: 2,
        already_recorded: 1,
        duplicate: 0,
        malformed: 1,
        failed: 0,
      });
      expect(store.packs).toHaveLength(1);
      expect(store.submissions).toHaveLength(2);
    });

    it("should finish the in-flight item before stop resolves", async () => {
      let deliver: (payload: string) => void = () => undefined;
      redis.dequeueBlocking
        .mockImplementationOnce(
          () =>
            new Promise<string>((resolve) => {
              deliver = resolve;
            }),
        )
        .mockImplementation(emptyQueue);

      service.start();
      // Let the loop reach the blocking dequeue
      await new Promise((resolve) => setImmediate(resolve));
      const stopped = service.stop();
      deliver(serializeEnvelope());
      await stopped;

      expect(store.commits).toBe(1);
      expect(store.submissions).toHaveLength(1);
      expect(redis.dequeueBlocking).toHaveBeenCalledTimes(1);
    });
  });
});
