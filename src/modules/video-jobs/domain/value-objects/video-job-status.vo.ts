import { BaseValueObject } from '@core/domain/value-objects/base-value-object'

export const VIDEO_JOB_STATUSES = [
  'queued',
  'processing',
  'completed',
  'failed',
  'finalized',
] as const

export type VideoJobStatus = (typeof VIDEO_JOB_STATUSES)[number]

/** Statuses counted as "processing" on the dashboard. */
export const IN_FLIGHT_STATUSES: readonly VideoJobStatus[] = [
  'queued',
  'processing',
]

/**
 * Jobs start in `processing` and the only transition the API performs is
 * to `finalized`, from any status, any number of times.
 */
export class VideoJobStatusVO extends BaseValueObject<VideoJobStatus> {
  private constructor(value: VideoJobStatus) {
    super(value)
  }

  static create(value: VideoJobStatus): VideoJobStatusVO {
    return new VideoJobStatusVO(value)
  }

  static createInitial(): VideoJobStatusVO {
    return VideoJobStatusVO.create('processing')
  }

  static createFinal(): VideoJobStatusVO {
    return VideoJobStatusVO.create('finalized')
  }

  override toString(): string {
    return this.value
  }
}
