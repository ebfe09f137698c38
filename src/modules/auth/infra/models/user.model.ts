import { COLLECTIONS, defineCollection } from '@core/libs/database/collections'
import mongoose from 'mongoose'

export type UserRecord = {
  name: string
  email: string
  password_hash: string
  avatar_url?: string | null
}

const userSchema = new mongoose.Schema<UserRecord>(
  {
    name: { type: String, required: true },
    email: { type: String, required: true, index: true },
    password_hash: { type: String, required: true },
    avatar_url: { type: String, default: null },
  },
  {
    timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
    versionKey: false,
  },
)

export const userCollection = defineCollection<UserRecord>({
  modelName: 'User',
  collection: COLLECTIONS.user,
  schema: userSchema,
})
