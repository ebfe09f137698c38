import {
  DefaultEntity,
  type EntityTimestamps,
} from '@core/domain/entity/default-entity'
import { UniqueEntityID } from '@core/domain/value-objects/unique-entity-id.vo'
import { AspectRatioVO } from '@modules/video-jobs/domain/value-objects/aspect-ratio.vo'
import { DurationVO } from '@modules/video-jobs/domain/value-objects/duration.vo'
import { VideoJobStatusVO } from '@modules/video-jobs/domain/value-objects/video-job-status.vo'

export type VideoJobAssets = {
  productImageUrl?: string
  brandLogoUrl?: string
  brandGuidelineUrl?: string
  referenceImageUrl?: string
}

export type VideoJobOutputs = {
  thumbnailUrl?: string
  videoUrl?: string
  notes?: string
}

export type VideoJobProps = {
  ownerEmail: string
  projectId?: string
  projectName: string
  brandName: string
  brandDetail: string
  creativePrompt: string
  targetAudience: string
  videoStyle: string
  aspectRatio: AspectRatioVO
  duration: DurationVO
  assets: VideoJobAssets
  status: VideoJobStatusVO
  outputs: VideoJobOutputs
}

export type CreateVideoJobProps = Omit<VideoJobProps, 'status' | 'outputs'>

/**
 * A recorded request to produce an ad video. Nothing generates the video;
 * the record only moves to `finalized` when a client says so.
 */
export class VideoJob extends DefaultEntity {
  private readonly _status: VideoJobStatusVO
  readonly ownerEmail: string
  readonly projectId: string | undefined
  readonly projectName: string
  readonly brandName: string
  readonly brandDetail: string
  readonly creativePrompt: string
  readonly targetAudience: string
  readonly videoStyle: string
  readonly aspectRatio: AspectRatioVO
  readonly duration: DurationVO
  readonly assets: VideoJobAssets
  readonly outputs: VideoJobOutputs

  private constructor(
    props: VideoJobProps,
    id: UniqueEntityID,
    timestamps?: EntityTimestamps,
  ) {
    super(id, timestamps)
    this._status = props.status
    this.ownerEmail = props.ownerEmail
    this.projectId = props.projectId
    this.projectName = props.projectName
    this.brandName = props.brandName
    this.brandDetail = props.brandDetail
    this.creativePrompt = props.creativePrompt
    this.targetAudience = props.targetAudience
    this.videoStyle = props.videoStyle
    this.aspectRatio = props.aspectRatio
    this.duration = props.duration
    this.assets = props.assets
    this.outputs = props.outputs
  }

  static create(props: CreateVideoJobProps): VideoJob {
    return new VideoJob(
      {
        ...props,
        status: VideoJobStatusVO.createInitial(),
        outputs: {},
      },
      UniqueEntityID.create(),
    )
  }

  static restore(
    props: VideoJobProps,
    id: UniqueEntityID,
    timestamps: EntityTimestamps,
  ): VideoJob {
    return new VideoJob(props, id, timestamps)
  }

  get status(): VideoJobStatusVO {
    return this._status
  }
}
