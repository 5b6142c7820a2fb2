import { z } from 'zod';
import { DEFAULTS } from './defaults.js';

export const TwinpaneConfigSchema = z.object({
  lookahead: z.number().int().positive().default(DEFAULTS.lookahead),
  binaryProbeBytes: z.number().int().positive().default(DEFAULTS.binaryProbeBytes),
  closeGuard: z.enum(['two-step', 'prompt']).default(DEFAULTS.closeGuard),
  preserveTimestamps: z.boolean().default(DEFAULTS.preserveTimestamps),
  showHidden: z.boolean().default(DEFAULTS.showHidden),
  exclude: z.array(z.string()).optional(),
  output: z.enum(['text', 'json']).default(DEFAULTS.output),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default(DEFAULTS.logLevel),
});

export type TwinpaneConfig = z.infer<typeof TwinpaneConfigSchema>;
