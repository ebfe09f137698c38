import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'

export type EntityTimestamps = {
  createdAt?: Date
  updatedAt?: Date
}

export abstract class DefaultEntity {
  public readonly createdAt: Date
  public readonly updatedAt: Date

  constructor(
    public readonly id: UniqueEntityID,
    timestamps: EntityTimestamps = {},
  ) {
    const now = new Date()
    this.createdAt = timestamps.createdAt ?? now
    this.updatedAt = timestamps.updatedAt ?? this.createdAt
  }
}
