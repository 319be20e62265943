import { z } from 'zod';
import { viewportChangeSchema, viewStateSchema } from '@world-disasters/shared';

export const ViewRequestSchema = z.object({
  year: z.preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v), z.number().int()),
  disasterType: z.string().trim().min(1).max(40),
  viewport: viewportChangeSchema.nullish(),
  viewState: viewStateSchema.optional(),
});

export type ViewRequest = z.infer<typeof ViewRequestSchema>;
