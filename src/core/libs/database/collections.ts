import type { Connection, Model, Schema } from 'mongoose'

/**
 * Collection names for every stored record type. Mapping is declared here
 * rather than derived from model names.
 */
export const COLLECTIONS = {
  user: 'user',
  project: 'project',
  videoJob: 'videojob',
} as const

export type CollectionName =
  (typeof COLLECTIONS)[keyof typeof COLLECTIONS]

export interface RegisteredCollection {
  readonly modelName: string
  readonly collection: CollectionName
  register(connection: Connection): unknown
}

export interface CollectionDefinition<TRecord> extends RegisteredCollection {
  readonly schema: Schema<TRecord>
  register(connection: Connection): Model<TRecord>
}

export function defineCollection<TRecord>(params: {
  modelName: string
  collection: CollectionName
  schema: Schema<TRecord>
}): CollectionDefinition<TRecord> {
  return {
    ...params,
    register(connection: Connection): Model<TRecord> {
      return (
        connection.models[params.modelName] ??
        connection.model<TRecord>(
          params.modelName,
          params.schema,
          params.collection,
        )
      )
    },
  }
}
