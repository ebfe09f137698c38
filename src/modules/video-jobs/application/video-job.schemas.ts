import { emailSchema } from '@core/libs/validation/email.schema'
import {
  ASPECT_RATIOS,
  AspectRatioVO,
} from '@modules/video-jobs/domain/value-objects/aspect-ratio.vo'
import { DurationVO } from '@modules/video-jobs/domain/value-objects/duration.vo'
import { z } from 'zod'

const HTTP_URL_PATTERN = /^https?:\/\//i

const assetUrl = z
  .string()
  .trim()
  .url()
  .regex(HTTP_URL_PATTERN, { message: 'Expected an http or https URL' })
  .nullish()
  .transform((value) => value ?? undefined)

export const CreateVideoJobSchema = z.object({
  owner_email: emailSchema,
  project_name: z.string(),
  brand_name: z.string(),
  brand_detail: z.string().default(''),
  creative_prompt: z.string(),
  target_audience: z.string(),
  video_style: z.string(),
  aspect_ratio: z.enum(ASPECT_RATIOS).default(AspectRatioVO.DEFAULT),
  duration_seconds: z
    .number()
    .int()
    .min(DurationVO.MIN_SECONDS)
    .max(DurationVO.MAX_SECONDS)
    .default(DurationVO.DEFAULT_SECONDS),
  product_image_url: assetUrl,
  brand_logo_url: assetUrl,
  brand_guideline_url: assetUrl,
  reference_image_url: assetUrl,
})

export const DashboardQuerySchema = z.object({
  email: emailSchema,
})
