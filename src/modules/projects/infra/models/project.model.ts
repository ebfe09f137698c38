import { COLLECTIONS, defineCollection } from '@core/libs/database/collections'
import mongoose from 'mongoose'

/**
 * Brand project an owner groups video jobs under. Registered with the
 * datasource so the collection exists, but no route reads or writes it yet.
 */
export type ProjectRecord = {
  owner_email: string
  project_name: string
  brand_name: string
  brand_detail: string
}

const projectSchema = new mongoose.Schema<ProjectRecord>(
  {
    owner_email: { type: String, required: true, index: true },
    project_name: { type: String, required: true },
    brand_name: { type: String, required: true },
    brand_detail: { type: String, default: '' },
  },
  {
    timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
    versionKey: false,
  },
)

export const projectCollection = defineCollection<ProjectRecord>({
  modelName: 'Project',
  collection: COLLECTIONS.project,
  schema: projectSchema,
})
