import { Result } from '@core/domain/result'
import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'
import { EmailAlreadyRegisteredError } from '@core/errors/auth.error'
import type { DatabaseError } from '@core/errors/database.error'
import { DataSource } from '@core/libs/database/datasource'
import {
  DefaultMongoDatabase,
  type StoredRecord,
} from '@core/libs/database/default-mongo.database'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { User } from '@modules/auth/domain/entities/user'
import type { UserRepository } from '@modules/auth/domain/repositories/user.repository'
import {
  userCollection,
  type UserRecord,
} from '@modules/auth/infra/models/user.model'

export class UserRepositoryImpl
  extends DefaultMongoDatabase<UserRecord>
  implements UserRepository
{
  constructor(datasource: DataSource, logger: AbstractLoggerService) {
    super(datasource, userCollection, logger)
  }

  async findByEmail(
    email: string,
  ): Promise<Result<User | null, DatabaseError>> {
    const found = await this.findOne({ email })
    if (found.isFailure) return Result.fail(found.error)

    return Result.ok(found.value ? this.toEntity(found.value) : null)
  }

  async createIfEmailAvailable(
    user: User,
  ): Promise<Result<User, EmailAlreadyRegisteredError | DatabaseError>> {
    const existing = await this.count({ email: user.email })
    if (existing.isFailure) return Result.fail(existing.error)

    if (existing.value > 0) {
      this.logger.warn('Signup for an email already registered', {
        userId: user.id.value,
      })
      return Result.fail(EmailAlreadyRegisteredError.create())
    }

    const inserted = await this.insert(
      {
        name: user.name,
        email: user.email,
        password_hash: user.passwordHash,
        avatar_url: user.avatarUrl ?? null,
      },
      user.id,
    )
    if (inserted.isFailure) return Result.fail(inserted.error)

    return Result.ok(user)
  }

  private toEntity(record: StoredRecord<UserRecord>): User {
    return User.restore(
      {
        name: record.name,
        email: record.email,
        passwordHash: record.password_hash,
        avatarUrl: record.avatar_url ?? undefined,
      },
      UniqueEntityID.create(record._id.toHexString()),
      { createdAt: record.created_at, updatedAt: record.updated_at },
    )
  }
}
