import { Result } from '@core/domain/result'
import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'
import {
  DatabaseExecutionError,
  type DatabaseError,
} from '@core/errors/database.error'
import type { CollectionDefinition } from '@core/libs/database/collections'
import type { DataSource } from '@core/libs/database/datasource'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import mongoose, {
  type FilterQuery,
  type Model,
  type SortOrder,
  type UpdateQuery,
} from 'mongoose'

export type StoredRecord<TRecord> = TRecord & {
  _id: mongoose.Types.ObjectId
  created_at: Date
  updated_at: Date
}

export type SelectEntity<TRecord> = {
  where: FilterQuery<TRecord>
  sort?: Record<string, SortOrder>
  limit?: number
}

export type UpdateEntity<TRecord> = {
  where: FilterQuery<TRecord>
  data: UpdateQuery<TRecord>
}

/**
 * Generic access to one declared collection. Every call is a single round
 * trip; a datasource without a live connection fails before touching the
 * driver.
 */
export abstract class DefaultMongoDatabase<TRecord> {
  constructor(
    protected readonly datasource: DataSource,
    protected readonly definition: CollectionDefinition<TRecord>,
    protected readonly logger: AbstractLoggerService,
  ) {}

  async insert(
    data: TRecord,
    id: UniqueEntityID = UniqueEntityID.create(),
  ): Promise<Result<string, DatabaseError>> {
    return this.run('insert', async (model) => {
      await model.create({
        ...data,
        _id: new mongoose.Types.ObjectId(id.value),
      })
      return id.value
    })
  }

  async selectById(
    id: string,
  ): Promise<Result<StoredRecord<TRecord> | null, DatabaseError>> {
    return this.run('selectById', (model) =>
      model.findById(id).lean<StoredRecord<TRecord> | null>().exec(),
    )
  }

  async findOne(
    where: FilterQuery<TRecord>,
  ): Promise<Result<StoredRecord<TRecord> | null, DatabaseError>> {
    return this.run('findOne', (model) =>
      model.findOne(where).lean<StoredRecord<TRecord> | null>().exec(),
    )
  }

  async select(
    entity: SelectEntity<TRecord>,
  ): Promise<Result<StoredRecord<TRecord>[], DatabaseError>> {
    return this.run('select', (model) => {
      let query = model.find(entity.where)
      if (entity.sort) query = query.sort(entity.sort)
      if (entity.limit !== undefined) query = query.limit(entity.limit)
      return query.lean<StoredRecord<TRecord>[]>().exec()
    })
  }

  /**
   * @returns number of documents matched by `where`
   */
  async update(
    entity: UpdateEntity<TRecord>,
  ): Promise<Result<number, DatabaseError>> {
    return this.run('update', async (model) => {
      const result = await model.updateMany(entity.where, entity.data).exec()
      return result.matchedCount
    })
  }

  /**
   * @returns 1 when the document exists, 0 otherwise
   */
  async updateById(
    id: string,
    data: UpdateQuery<TRecord>,
  ): Promise<Result<number, DatabaseError>> {
    return this.run('updateById', async (model) => {
      const previous = await model.findByIdAndUpdate(id, data).lean().exec()
      return previous ? 1 : 0
    })
  }

  async count(
    where: FilterQuery<TRecord>,
  ): Promise<Result<number, DatabaseError>> {
    return this.run('count', (model) => model.countDocuments(where).exec())
  }

  private async run<T>(
    operation: string,
    fn: (model: Model<TRecord>) => Promise<T>,
  ): Promise<Result<T, DatabaseError>> {
    const collection = this.definition.collection
    const model = this.datasource.model(this.definition)

    if (model.isFailure) {
      this.logger.warn('Database not available', { collection, operation })
      return Result.fail(model.error)
    }

    try {
      return Result.ok(await fn(model.value))
    } catch (error) {
      this.logger.error('Database operation failed', {
        collection,
        operation,
        error,
      })
      return Result.fail(
        DatabaseExecutionError.create(
          error instanceof Error ? error.message : String(error),
          error,
        ),
      )
    }
  }
}
