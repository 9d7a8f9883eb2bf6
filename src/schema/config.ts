import { z } from 'zod';

// ── Config file ─────────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    title: z.string().min(1).optional(),
    projectName: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    quiet: z.boolean().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
