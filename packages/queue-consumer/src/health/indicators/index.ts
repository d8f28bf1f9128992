export * from "./redis.health";
export * from "./database.health";
export * from "./consumer.health";
