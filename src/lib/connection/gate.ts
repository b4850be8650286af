/**
 * Lazy init gate - opens the target connections exactly once
 */

import { Mutex } from "../utils/mutex.js";
import { connectPostgres } from "./postgres.js";
import type {
  Connector,
  MirrorConnection,
  TargetConfig,
} from "./types.js";
import { ConnectionError, errorMessage } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Double-checked bootstrap: callers that find the gate open return at
 * once; the rest queue on the mutex and re-check before connecting, so any
 * number of concurrent callers trigger a single bootstrap.
 */
export class InitGate {
  private initialized = false;
  private connections = new Map<string, MirrorConnection>();
  private readonly mutex = new Mutex();

  constructor(
    private readonly config: TargetConfig,
    private readonly connect: Connector = connectPostgres,
  ) {}

  async ensureInitialized(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.mutex.runExclusive(async () => {
      if (this.initialized) {
        return;
      }
      await this.bootstrap();
    });
  }

  /**
   * Idempotent; same as `ensureInitialized`.
   */
  async init(): Promise<void> {
    await this.ensureInitialized();
  }

  private async bootstrap(): Promise<void> {
    const opened = new Map<string, MirrorConnection>();
    for (const [alias, connection] of Object.entries(this.config.connections)) {
      try {
        opened.set(alias, await this.connect(connection));
      } catch (error) {
        await this.closeAll(opened).catch((rollback: unknown) => {
          logger.warn("Rollback after failed bootstrap did not close every connection", {
            alias,
            error: errorMessage(rollback),
          });
        });
        throw new ConnectionError(
          `Failed to initialize connection '${alias}': ${errorMessage(error)}`,
          { alias, host: connection.host, database: connection.database },
          { cause: error },
        );
      }
    }

    this.connections = opened;
    this.initialized = true;
    logger.info("Target connections initialized", {
      aliases: Array.from(opened.keys()),
      app: this.config.appName,
    });
  }

  private async closeAll(connections: Map<string, MirrorConnection>): Promise<void> {
    const results = await Promise.allSettled(
      Array.from(connections.values(), (connection) => connection.close()),
    );
    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    for (const failure of failures) {
      logger.error("Failed to close connection", { error: errorMessage(failure.reason) });
    }
    if (failures.length > 0) {
      throw new ConnectionError(`Failed to close ${failures.length} connection(s)`, undefined, {
        cause: failures[0]?.reason,
      });
    }
  }

  /**
   * Close every connection. A no-op when nothing is open; the gate can be
   * initialized again afterwards.
   */
  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (!this.initialized) {
        return;
      }
      const connections = this.connections;
      this.connections = new Map();
      this.initialized = false;
      await this.closeAll(connections);
      logger.info("Target connections closed");
    });
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  getConnections(): ReadonlyMap<string, MirrorConnection> {
    return this.connections;
  }

  getConnection(alias: string): MirrorConnection {
    const connection = this.connections.get(alias);
    if (connection === undefined) {
      throw new ConnectionError(
        this.initialized
          ? `Unknown connection alias '${alias}'`
          : "Target connections are not initialized",
        { alias },
      );
    }
    return connection;
  }

  /**
   * Forget all state without closing anything. For test isolation.
   */
  reset(): void {
    this.connections = new Map();
    this.initialized = false;
  }
}
