import { z } from 'zod';

export const evalConfigSchema = z.object({
  tmpDir: z.string().min(1).optional(),
  outputRetention: z.enum(['retain', 'delete']).optional(),
  naming: z.enum(['unique', 'fixed']).optional(),
  unitPrefix: z.string().min(1).optional(),
  classpath: z.array(z.string().min(1)).optional(),
  typeCheck: z.boolean().optional(),
  strict: z.boolean().optional(),
  deprecationWarnings: z.boolean().optional(),
  isolation: z.enum(['host', 'isolated']).optional(),
  evaluationErrors: z.enum(['propagate', 'wrap']).optional()
}).strict();
