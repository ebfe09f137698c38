import { Result } from '@core/domain/result'
import {
  DatabaseConnectionError,
  DatabaseDisconnectionError,
  DatabaseExecutionError,
  DatabaseUnavailableError,
  type DatabaseError,
} from '@core/errors/database.error'
import type {
  CollectionDefinition,
  RegisteredCollection,
} from '@core/libs/database/collections'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import mongoose, { type Connection, type Model } from 'mongoose'

export type DataSourceOptions = {
  url?: string
  name?: string
  timeoutMs: number
}

/**
 * Read-only view of the store used by health and diagnostic routes.
 */
export interface DatabaseProbe {
  readonly hasUrl: boolean
  readonly isConnected: boolean
  readonly configuredName: string | undefined
  ping(): Promise<Result<{ latencyMs: number }, DatabaseError>>
  listCollectionNames(): Promise<Result<string[], DatabaseError>>
}

/**
 * Owns the MongoDB connection. Built once in the entry point and handed to
 * every repository; nothing reaches the connection through module state.
 */
export class DataSource implements DatabaseProbe {
  private connection: Connection | undefined

  constructor(
    private readonly options: DataSourceOptions,
    private readonly logger: AbstractLoggerService,
    private readonly collections: readonly RegisteredCollection[] = [],
  ) {}

  get hasUrl(): boolean {
    return Boolean(this.options.url)
  }

  get isConnected(): boolean {
    return this.connection?.readyState === mongoose.ConnectionStates.connected
  }

  get configuredName(): string | undefined {
    return this.options.name
  }

  async connect(): Promise<Result<void, DatabaseConnectionError>> {
    const { url, name, timeoutMs } = this.options
    if (!url || !name) {
      this.logger.warn('Database settings missing, running without a store', {
        databaseUrlSet: Boolean(url),
        databaseNameSet: Boolean(name),
      })
      return Result.fail(
        DatabaseConnectionError.create('DATABASE_URL or DATABASE_NAME is not set'),
      )
    }

    try {
      this.logger.log('Connecting to database', { database: name })
      const connection = mongoose.createConnection(url, {
        dbName: name,
        serverSelectionTimeoutMS: timeoutMs,
        socketTimeoutMS: timeoutMs,
        bufferCommands: false,
      })
      await connection.asPromise()

      for (const collection of this.collections) {
        collection.register(connection)
      }

      connection.on('disconnected', () => {
        this.logger.warn('Database disconnected', { database: name })
      })

      this.connection = connection
      this.logger.log('Connected to database', {
        database: name,
        collections: this.collections.map((c) => c.collection),
      })
      return Result.ok(undefined)
    } catch (error) {
      this.logger.error('Error connecting to database', { error })
      return Result.fail(
        DatabaseConnectionError.create(
          error instanceof Error
            ? error.message
            : 'Unknown error trying to connect to database',
          error,
        ),
      )
    }
  }

  async disconnect(): Promise<Result<void, DatabaseDisconnectionError>> {
    if (!this.connection) return Result.ok(undefined)

    try {
      await this.connection.close()
      this.connection = undefined
      this.logger.log('Disconnected from database')
      return Result.ok(undefined)
    } catch (error) {
      this.logger.error('Error disconnecting from database', { error })
      return Result.fail(
        DatabaseDisconnectionError.create(
          error instanceof Error
            ? error.message
            : 'Unknown error trying to disconnect from database',
        ),
      )
    }
  }

  model<TRecord>(
    definition: CollectionDefinition<TRecord>,
  ): Result<Model<TRecord>, DatabaseUnavailableError> {
    const connection = this.liveConnection()
    if (!connection) return Result.fail(DatabaseUnavailableError.create())
    return Result.ok(definition.register(connection))
  }

  async ping(): Promise<Result<{ latencyMs: number }, DatabaseError>> {
    const connection = this.liveConnection()
    if (!connection?.db) return Result.fail(DatabaseUnavailableError.create())

    const startTime = performance.now()
    try {
      await connection.db.command({ ping: 1 })
      return Result.ok({
        latencyMs: Math.round(performance.now() - startTime),
      })
    } catch (error) {
      this.logger.error('Database ping failed', { error })
      return Result.fail(this.toExecutionError(error, 'Ping failed'))
    }
  }

  async listCollectionNames(): Promise<Result<string[], DatabaseError>> {
    const connection = this.liveConnection()
    if (!connection?.db) return Result.fail(DatabaseUnavailableError.create())

    try {
      const collections = await connection.db
        .listCollections({}, { nameOnly: true })
        .toArray()
      return Result.ok(collections.map((collection) => collection.name))
    } catch (error) {
      this.logger.error('Error listing collections', { error })
      return Result.fail(
        this.toExecutionError(error, 'Could not list collections'),
      )
    }
  }

  private liveConnection(): Connection | undefined {
    return this.isConnected ? this.connection : undefined
  }

  private toExecutionError(error: unknown, fallback: string) {
    return DatabaseExecutionError.create(
      error instanceof Error ? error.message : fallback,
      error,
    )
  }
}
