import { COLLECTIONS, defineCollection } from '@core/libs/database/collections'
import {
  ASPECT_RATIOS,
  AspectRatioVO,
  type AspectRatio,
} from '@modules/video-jobs/domain/value-objects/aspect-ratio.vo'
import { DurationVO } from '@modules/video-jobs/domain/value-objects/duration.vo'
import {
  VIDEO_JOB_STATUSES,
  type VideoJobStatus,
} from '@modules/video-jobs/domain/value-objects/video-job-status.vo'
import mongoose from 'mongoose'

export type VideoJobRecord = {
  owner_email: string
  project_id: string | null
  project_name: string
  brand_name: string
  brand_detail: string
  creative_prompt: string
  target_audience: string
  video_style: string
  aspect_ratio: AspectRatio
  duration_seconds: number
  product_image_url: string | null
  brand_logo_url: string | null
  brand_guideline_url: string | null
  reference_image_url: string | null
  status: VideoJobStatus
  thumbnail_url: string | null
  video_url: string | null
  notes: string | null
}

const optionalText = { type: String, default: null }

const videoJobSchema = new mongoose.Schema<VideoJobRecord>(
  {
    owner_email: { type: String, required: true },
    project_id: optionalText,
    project_name: { type: String, required: true },
    brand_name: { type: String, required: true },
    brand_detail: { type: String, default: '' },
    creative_prompt: { type: String, required: true },
    target_audience: { type: String, required: true },
    video_style: { type: String, required: true },
    aspect_ratio: {
      type: String,
      enum: ASPECT_RATIOS,
      default: AspectRatioVO.DEFAULT,
    },
    duration_seconds: {
      type: Number,
      min: DurationVO.MIN_SECONDS,
      max: DurationVO.MAX_SECONDS,
      default: DurationVO.DEFAULT_SECONDS,
    },
    product_image_url: optionalText,
    brand_logo_url: optionalText,
    brand_guideline_url: optionalText,
    reference_image_url: optionalText,
    status: {
      type: String,
      enum: VIDEO_JOB_STATUSES,
      default: 'processing',
    },
    thumbnail_url: optionalText,
    video_url: optionalText,
    notes: optionalText,
  },
  {
    timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' },
    versionKey: false,
  },
)

videoJobSchema.index({ owner_email: 1, created_at: -1 })

export const videoJobCollection = defineCollection<VideoJobRecord>({
  modelName: 'VideoJob',
  collection: COLLECTIONS.videoJob,
  schema: videoJobSchema,
})
