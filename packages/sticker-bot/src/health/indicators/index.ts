export * from "./redis.health";
