import { VideoJob } from '@modules/video-jobs/domain/entities/video-job'
import type { AspectRatio } from '@modules/video-jobs/domain/value-objects/aspect-ratio.vo'
import type { VideoJobStatus } from '@modules/video-jobs/domain/value-objects/video-job-status.vo'

export type VideoJobResponse = {
  id: string
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
  created_at: string
  updated_at: string
}

export class VideoJobPresenter {
  static toHttp(job: VideoJob): VideoJobResponse {
    return {
      id: job.id.value,
      owner_email: job.ownerEmail,
      project_id: job.projectId ?? null,
      project_name: job.projectName,
      brand_name: job.brandName,
      brand_detail: job.brandDetail,
      creative_prompt: job.creativePrompt,
      target_audience: job.targetAudience,
      video_style: job.videoStyle,
      aspect_ratio: job.aspectRatio.value,
      duration_seconds: job.duration.seconds,
      product_image_url: job.assets.productImageUrl ?? null,
      brand_logo_url: job.assets.brandLogoUrl ?? null,
      brand_guideline_url: job.assets.brandGuidelineUrl ?? null,
      reference_image_url: job.assets.referenceImageUrl ?? null,
      status: job.status.value,
      thumbnail_url: job.outputs.thumbnailUrl ?? null,
      video_url: job.outputs.videoUrl ?? null,
      notes: job.outputs.notes ?? null,
      created_at: job.createdAt.toISOString(),
      updated_at: job.updatedAt.toISOString(),
    }
  }
}
