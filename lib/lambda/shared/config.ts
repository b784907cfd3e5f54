import { z } from 'zod';
import { GENERATION_KINDS } from './generation-schemas';

// ============================================
// Environment
//
// Every Lambda reads its configuration from environment variables set by
// the CDK stack. Defaults keep local runs and tests working without them.
// ============================================

/** Per-kind model overrides, e.g. `{"choices":"haiku","fullMission":"sonnet"}` */
const ModelOverridesSchema = z.record(z.enum(GENERATION_KINDS), z.string().min(1));

const ModelOverridesEnv = z
  .string()
  .default('{}')
  .transform((raw, ctx) => {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON object' });
      return z.NEVER;
    }
    const parsed = ModelOverridesSchema.safeParse(json);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${issue.path.join('.') || '(root)'}: ${issue.message}` });
      }
      return z.NEVER;
    }
    return parsed.data;
  });

/** Below the 90 s timeout of the generating Lambdas, leaving time to commit. */
const MAX_GENERATION_TIMEOUT_MS = 85_000;

const EnvSchema = z.object({
  PLAYERS_TABLE_NAME: z.string().min(1).default('DeadDrop-Players'),
  MISSIONS_TABLE_NAME: z.string().min(1).default('DeadDrop-Missions'),
  STORIES_TABLE_NAME: z.string().min(1).default('DeadDrop-Stories'),
  NODES_TABLE_NAME: z.string().min(1).default('DeadDrop-StoryNodes'),
  CHOICES_TABLE_NAME: z.string().min(1).default('DeadDrop-StoryChoices'),
  CHARACTERS_TABLE_NAME: z.string().min(1).default('DeadDrop-Characters'),
  TRANSACTIONS_TABLE_NAME: z.string().min(1).default('DeadDrop-Transactions'),
  BEDROCK_DEFAULT_MODEL_ID: z.string().min(1).default('us.anthropic.claude-haiku-4-5-20251001-v1:0'),
  BEDROCK_MODEL_OVERRIDES: ModelOverridesEnv,
  /** Upper bound on a single generation call; a timeout counts as a gateway failure */
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_GENERATION_TIMEOUT_MS).default(60_000),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.8),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/** Name of the GSI on the choices table keyed by nodeId. */
export const CHOICES_BY_NODE_INDEX = 'byNode';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}
