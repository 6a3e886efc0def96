import { Injectable, OnModuleDestroy } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { auth, driver, Driver, QueryResult, Session } from "neo4j-driver";
import { Entity } from "../../../common/abstracts/entity";
import { DataModelInterface } from "../../../common/interfaces/datamodel.interface";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { ConfigNeo4jInterface } from "../../../config/interfaces/config.neo4j.interface";
import { JsonApiCursorInterface } from "../../jsonapi/interfaces/jsonapi.cursor.interface";
import { AppLoggingService } from "../../logging/services/logging.service";
import { EntityFactory } from "../factories/entity.factory";

export type QueryParams = Record<string, unknown>;

export type QueryType<T extends Entity> = {
  query: string;
  queryParams: QueryParams;
  cursor?: JsonApiCursorInterface;
  serialiser?: DataModelInterface<T>;
  fetchAll?: boolean;
  retry?: boolean;
};

export type WriteOptions = {
  /** Re-run the write when it fails; leave off for writes that must not be applied twice */
  retry?: boolean;
};

@Injectable()
export class Neo4jService implements OnModuleDestroy {
  private readonly driver: Driver;
  private readonly database?: string;
  private readonly maxRetries: number = 3;
  private readonly retryDelay: number = 1000;

  constructor(
    private readonly entityFactory: EntityFactory,
    private readonly configService: ConfigService<BaseConfigInterface, true>,
    private readonly logger: AppLoggingService,
  ) {
    const neo4jConfig: ConfigNeo4jInterface = this.configService.get("neo4j", { infer: true });

    if (!neo4jConfig?.uri) {
      throw new Error("Neo4j configuration is required. Ensure NEO4J_URI is set in environment.");
    }

    this.database = neo4jConfig.database || undefined;
    this.driver = driver(neo4jConfig.uri, auth.basic(neo4jConfig.username, neo4jConfig.password), {
      disableLosslessIntegers: true,
      maxConnectionPoolSize: 100,
      connectionAcquisitionTimeout: 20000,
      connectionTimeout: 20000,
      maxTransactionRetryTime: 15000,
      logging: {
        level: "warn",
        logger: (level, message) => this.logger.warn(message, "Neo4j", { driverLevel: level }),
      },
    });
  }

  initQuery<T extends Entity>(params?: {
    cursor?: JsonApiCursorInterface;
    serialiser?: DataModelInterface<T>;
    fetchAll?: boolean;
    retry?: boolean;
  }): QueryType<T> {
    return {
      query: "",
      queryParams: {},
      cursor: params?.cursor,
      serialiser: params?.serialiser,
      fetchAll: params?.fetchAll,
      retry: params?.retry,
    };
  }

  async readOne<T extends Entity>(params: QueryType<T>): Promise<T | null> {
    const result = await this.read(params.query, params.queryParams);

    return this.mapFirst(params, result);
  }

  async readMany<T extends Entity>(params: QueryType<T>): Promise<T[]> {
    params.query = params.query.replace(/^\s*$(?:\r\n?|\n)/gm, "");
    params.query = params.query.replace(/;\s*$/, "");

    if (params.query.includes("{CURSOR}")) {
      if (!params.fetchAll) {
        params.queryParams.cursor = params.cursor?.cursor;
        params.queryParams.take = params.cursor?.take ?? 21;

        if (params.cursor?.cursor)
          params.query = params.query.replace("{CURSOR}", `SKIP toInteger($cursor) LIMIT toInteger($take)`);
        else params.query = params.query.replace("{CURSOR}", `LIMIT toInteger($take)`);
      } else {
        params.query = params.query.replace("{CURSOR}", ``);
      }
    }

    const result = await this.read(params.query, params.queryParams);

    return this.mapAll(params, result);
  }

  async writeOne<T extends Entity>(params: QueryType<T>): Promise<T | null> {
    const result = await this.write(params.query, params.queryParams, { retry: params.retry });

    return this.mapFirst(params, result);
  }

  async read(query: string, params?: QueryParams): Promise<QueryResult> {
    const session = this.openSession();

    try {
      return await session.executeRead(async (tx) => {
        return await tx.run(query, params ?? {});
      });
    } catch (error) {
      this.logger.error(query, error instanceof Error ? error : String(error), Neo4jService.name, { params });
      if (error instanceof Error) {
        throw new Error(`Neo4j Read Error: ${error.message}`);
      }
      throw new Error("Neo4j Read Error: An unknown error occurred while reading the data");
    } finally {
      await session.close();
    }
  }

  async write(query: string, params?: QueryParams, options: WriteOptions = {}): Promise<QueryResult> {
    let session: Session | null = null;

    try {
      const activeSession = this.openSession();
      session = activeSession;

      const run = async () => {
        return await activeSession.executeWrite(async (tx) => {
          return await tx.run(query, params ?? {});
        });
      };

      return await (options.retry === false ? run() : this.withRetry(run));
    } catch (error) {
      this.logger.error(query, error instanceof Error ? error : String(error), Neo4jService.name, { params });
      throw error;
    } finally {
      if (session) await session.close();
    }
  }

  private openSession(): Session {
    return this.database ? this.driver.session({ database: this.database }) : this.driver.session();
  }

  private mapAll<T extends Entity>(params: QueryType<T>, result: QueryResult): T[] {
    if (!params.serialiser || result.records.length === 0) return [];

    return this.entityFactory.createGraphList({
      model: params.serialiser,
      records: result.records,
    });
  }

  private mapFirst<T extends Entity>(params: QueryType<T>, result: QueryResult): T | null {
    const items = this.mapAll(params, result);
    return items.length > 0 ? items[0] : null;
  }

  private async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: Error = new Error("Neo4j Write Error: no attempt was made");

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (attempt < this.maxRetries) {
          this.logger.warn(`Neo4j write attempt ${attempt} failed: ${lastError.message}`, Neo4jService.name);
          await new Promise((resolve) => setTimeout(resolve, this.retryDelay * attempt));
        }
      }
    }

    throw lastError;
  }

  async onModuleDestroy() {
    await this.driver.close();
  }
}
