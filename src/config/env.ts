import { z } from 'zod';
import dotenv from 'dotenv';
import { isValidTimeZone } from '../utils/helpers.js';
import { DEFAULT_DEMAND_HIGHLIGHT_THRESHOLD, DEFAULT_SCORING_WEIGHTS } from '../utils/constants.js';

dotenv.config();

const weight = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5000),
  API_PREFIX: z.string().default('/api/v1'),

  // MongoDB
  MONGODB_URI: z.string().min(1).default('mongodb://127.0.0.1:27017/consultations'),
  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('http'),

  // Academy timezone for human-readable slot labels
  TIMEZONE: z.string().refine(isValidTimeZone, 'Unknown IANA timezone').default('Asia/Seoul'),

  // Demand report: applicant count at which a slot is highlighted
  DEMAND_HIGHLIGHT_THRESHOLD: z.coerce.number().int().min(1).default(DEFAULT_DEMAND_HIGHLIGHT_THRESHOLD),

  // Scoring weights supplied at cycle start
  SCORING_SIBLING_BONUS: weight(DEFAULT_SCORING_WEIGHTS.sibling_bonus),
  SCORING_COMPLETENESS_BONUS: weight(DEFAULT_SCORING_WEIGHTS.completeness_bonus),
  SCORING_DISTANCE_WEIGHT: weight(DEFAULT_SCORING_WEIGHTS.distance_weight),
  SCORING_URGENCY_WEIGHT: weight(DEFAULT_SCORING_WEIGHTS.urgency_weight),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  console.error(parsed.error.flatten().fieldErrors);
  process.exit(1);
}

const envData = parsed.data;

if (envData.NODE_ENV === 'production') {
  const prodConfigErrors: string[] = [];

  if (/localhost|127\.0\.0\.1/.test(envData.MONGODB_URI)) {
    prodConfigErrors.push('MONGODB_URI cannot point at localhost in production');
  }

  if (envData.STORE_DRIVER === 'memory') {
    prodConfigErrors.push('STORE_DRIVER=memory is not allowed in production');
  }

  if (prodConfigErrors.length > 0) {
    console.error('Invalid production environment variables:');
    for (const message of prodConfigErrors) {
      console.error(`- ${message}`);
    }
    process.exit(1);
  }
}

export const env = envData;
