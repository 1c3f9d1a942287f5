import { z } from 'zod';

import { LOG_LEVELS } from '../utils/logger.js';

export const DEFAULT_CONFIG_FILE = 'pathrules.config.yaml';
export const DEFAULT_RULES_FILE = '.pathignore';

export const PathRulesConfigSchema = z
  .object({
    rulesFile: z.string().min(1).default(DEFAULT_RULES_FILE),
    cache: z.boolean().default(true),
    log: z
      .object({
        level: z.enum(LOG_LEVELS).default('info'),
        json: z.boolean().default(false)
      })
      .strict()
      .default({})
  })
  .strict();

export type PathRulesConfig = z.infer<typeof PathRulesConfigSchema>;
