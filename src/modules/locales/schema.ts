import { z } from 'zod'
import { LANGUAGE_CODE } from '../../core/config'

export const LocaleParamsSchema = z.object({
  locale: z.string().regex(LANGUAGE_CODE, 'invalid language code'),
})

export type LocaleParams = z.infer<typeof LocaleParamsSchema>
