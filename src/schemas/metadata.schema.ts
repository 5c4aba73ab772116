import { z } from 'zod'

export const metadataKeySchema = z
  .string()
  .refine((key) => key.trim().length > 0, { message: 'Metadata key must not be blank' })
