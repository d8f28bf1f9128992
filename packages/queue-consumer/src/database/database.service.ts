import {
  Injectable,
  Logger,
  OnModuleInit,
  OnApplicationShutdown,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Pool, PoolClient } from "pg";
import { ConsumerConfig } from "../config/configuration";
import { SCHEMA_STATEMENTS } from "./schema";

/**
 * DatabaseService
 * Owns the PostgreSQL pool and runs units of work inside BEGIN/COMMIT.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(private readonly configService: ConfigService) {}

  onModuleInit(): void {
    const database =
      this.configService.getOrThrow<ConsumerConfig["database"]>("database");

    this.logger.log(
      `Initializing PostgreSQL pool for ${database.host}:${database.port}/${database.name}`,
    );

    this.pool = new Pool({
      host: database.host,
      port: database.port,
      database: database.name,
      user: database.user,
      password: database.password,
      max: database.poolSize,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });

    // An idle client losing its connection must not crash the process
    this.pool.on("error", (error: Error) => {
      this.logger.error(`Idle PostgreSQL client error: ${error.message}`);
    });
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
      this.logger.log("PostgreSQL pool closed");
    }
  }

  /**
   * Check out a client and issue a trivial query.
   *
   * @returns true if PostgreSQL answered
   */
  async ping(): Promise<boolean> {
    try {
      await this.getPool().query("SELECT 1");
      return true;
    } catch (error) {
      this.logger.debug(
        `PostgreSQL ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async ensureSchema(): Promise<void> {
    const pool = this.getPool();
    for (const statement of SCHEMA_STATEMENTS) {
      await pool.query(statement);
    }
    this.logger.log("Database schema is up to date");
  }

  /**
   * Run `work` in a transaction on a single pooled client.
   *
   * Commits when `work` resolves, rolls back and rethrows when it or the
   * commit rejects. The client is always released.
   */
  async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getPool().connect();
    let discard = false;
    try {
      await client.query("BEGIN");
      const result = await work(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        // The connection is unusable; destroy it instead of returning it to the pool
        discard = true;
        this.logger.error(
          `Rollback failed: ${rollbackError instanceof Error ? rollbackError.message : String(rollbackError)}`,
        );
      }
      throw error;
    } finally {
      client.release(discard);
    }
  }

  private getPool(): Pool {
    if (!this.pool) {
      throw new Error("PostgreSQL pool is not initialized");
    }
    return this.pool;
  }
}
