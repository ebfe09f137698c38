import { Result } from '@core/domain/result'
import type { DatabaseError } from '@core/errors/database.error'
import { VideoJob } from '@modules/video-jobs/domain/entities/video-job'

export interface VideoJobRepository {
  create(job: VideoJob): Promise<Result<VideoJob, DatabaseError>>
  findById(id: string): Promise<Result<VideoJob | null, DatabaseError>>

  /**
   * Sets the status to `finalized`.
   * @returns whether a job with this id exists
   */
  markFinalized(id: string): Promise<Result<boolean, DatabaseError>>

  countByOwner(ownerEmail: string): Promise<Result<number, DatabaseError>>

  /** Jobs of the owner whose status is queued or processing. */
  countInFlightByOwner(
    ownerEmail: string,
  ): Promise<Result<number, DatabaseError>>

  /** Newest first, by creation time. */
  latestByOwner(
    ownerEmail: string,
    limit: number,
  ): Promise<Result<VideoJob[], DatabaseError>>
}
