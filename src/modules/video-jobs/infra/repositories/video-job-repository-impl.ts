import { Result } from '@core/domain/result'
import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'
import type { DatabaseError } from '@core/errors/database.error'
import { DataSource } from '@core/libs/database/datasource'
import {
  DefaultMongoDatabase,
  type StoredRecord,
} from '@core/libs/database/default-mongo.database'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { VideoJob } from '@modules/video-jobs/domain/entities/video-job'
import type { VideoJobRepository } from '@modules/video-jobs/domain/repositories/video-job.repository'
import { AspectRatioVO } from '@modules/video-jobs/domain/value-objects/aspect-ratio.vo'
import { DurationVO } from '@modules/video-jobs/domain/value-objects/duration.vo'
import {
  IN_FLIGHT_STATUSES,
  VideoJobStatusVO,
} from '@modules/video-jobs/domain/value-objects/video-job-status.vo'
import {
  videoJobCollection,
  type VideoJobRecord,
} from '@modules/video-jobs/infra/models/video-job.model'

export class VideoJobRepositoryImpl
  extends DefaultMongoDatabase<VideoJobRecord>
  implements VideoJobRepository
{
  constructor(datasource: DataSource, logger: AbstractLoggerService) {
    super(datasource, videoJobCollection, logger)
  }

  async create(job: VideoJob): Promise<Result<VideoJob, DatabaseError>> {
    const inserted = await this.insert(this.toRecord(job), job.id)
    return inserted.map(() => job)
  }

  async findById(
    id: string,
  ): Promise<Result<VideoJob | null, DatabaseError>> {
    const found = await this.selectById(id)
    return found.map((record) => (record ? this.toEntity(record) : null))
  }

  async markFinalized(id: string): Promise<Result<boolean, DatabaseError>> {
    const matched = await this.updateById(id, {
      status: VideoJobStatusVO.createFinal().value,
    })
    return matched.map((count) => count > 0)
  }

  async countByOwner(
    ownerEmail: string,
  ): Promise<Result<number, DatabaseError>> {
    return this.count({ owner_email: ownerEmail })
  }

  async countInFlightByOwner(
    ownerEmail: string,
  ): Promise<Result<number, DatabaseError>> {
    return this.count({
      owner_email: ownerEmail,
      status: { $in: [...IN_FLIGHT_STATUSES] },
    })
  }

  async latestByOwner(
    ownerEmail: string,
    limit: number,
  ): Promise<Result<VideoJob[], DatabaseError>> {
    const selected = await this.select({
      where: { owner_email: ownerEmail },
      sort: { created_at: -1 },
      limit,
    })
    return selected.map((records) =>
      records.map((record) => this.toEntity(record)),
    )
  }

  private toRecord(job: VideoJob): VideoJobRecord {
    return {
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
    }
  }

  private toEntity(record: StoredRecord<VideoJobRecord>): VideoJob {
    return VideoJob.restore(
      {
        ownerEmail: record.owner_email,
        projectId: record.project_id ?? undefined,
        projectName: record.project_name,
        brandName: record.brand_name,
        brandDetail: record.brand_detail,
        creativePrompt: record.creative_prompt,
        targetAudience: record.target_audience,
        videoStyle: record.video_style,
        aspectRatio: AspectRatioVO.from(record.aspect_ratio),
        duration: DurationVO.restore(record.duration_seconds),
        assets: {
          productImageUrl: record.product_image_url ?? undefined,
          brandLogoUrl: record.brand_logo_url ?? undefined,
          brandGuidelineUrl: record.brand_guideline_url ?? undefined,
          referenceImageUrl: record.reference_image_url ?? undefined,
        },
        status: VideoJobStatusVO.create(record.status),
        outputs: {
          thumbnailUrl: record.thumbnail_url ?? undefined,
          videoUrl: record.video_url ?? undefined,
          notes: record.notes ?? undefined,
        },
      },
      UniqueEntityID.create(record._id.toHexString()),
      { createdAt: record.created_at, updatedAt: record.updated_at },
    )
  }
}
