import { z } from 'zod';

// ============================================
// Generation Request Kinds
// ============================================

export const GENERATION_KINDS = [
  'fullMission',
  'missionBriefing',
  'opening',
  'choices',
  'continuation',
  'customResponse',
] as const;

export type GenerationKind = typeof GENERATION_KINDS[number];

// ============================================
// Model Configuration
// ============================================

export interface GenerationModelConfig {
  /**
   * Fallback model for any kind not listed in `kinds`.
   * Use a full inference profile ID (e.g. us.anthropic.claude-haiku-4-5-20251001-v1:0)
   * or a shortcut: haiku, sonnet, sonnet4, opus, opus45, opus41.
   */
  default: string;
  /** Per-kind overrides; same format (full ID or shortcut). */
  kinds?: Partial<Record<GenerationKind, string>>;
}

// ============================================
// Field Length Limits
//
// Keyed by wire field name, per request kind. A string field longer than
// its limit is truncated to exactly the limit before validation; it is
// never rejected. Limits apply at any depth (e.g. inside choices[]).
// ============================================

export const FIELD_LIMITS: Record<GenerationKind, Readonly<Record<string, number>>> = {
  fullMission: {
    mission_title: 200,
    mission_description: 1000,
    objective: 255,
    deadline: 200,
    setting: 255,
    narrative_style: 100,
    mood: 100,
    opening_narrative: 1500,
    next_node_summary: 255,
  },
  missionBriefing: {
    title: 200,
    deadline: 200,
  },
  opening: {
    opening_narrative: 1500,
  },
  choices: {},
  continuation: {
    narrative_text: 1500,
  },
  customResponse: {
    narrative_text: 1500,
  },
};

// ============================================
// Zod Schemas for Generator Output
//
// Wire field names are snake_case and part of the contract. Enum-like
// fields (difficulty, risk_level) are plain strings here: off-scale values
// are normalized by the callers, not rejected.
// ============================================

export const FullMissionChoiceSchema = z.object({
  text: z.string().min(1),
  character_used: z.string().default('Unknown'),
  risk_level: z.string().default('medium'),
  next_node_summary: z.string().default(''),
});

export const FullMissionResponseSchema = z.object({
  mission_title: z.string().min(1),
  mission_description: z.string().min(1),
  objective: z.string().min(1),
  difficulty: z.string().default('medium'),
  deadline: z.string().default('48 hours'),
  setting: z.string().default('Various espionage locations'),
  narrative_style: z.string().optional(),
  mood: z.string().optional(),
  opening_narrative: z.string().min(1),
  /** Three are required; extras are dropped when the choices are attached */
  choices: z.array(FullMissionChoiceSchema).min(3),
});

export type FullMissionResponse = z.infer<typeof FullMissionResponseSchema>;

export const MissionBriefingResponseSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  objective: z.string().min(1),
  /** easy | medium | hard */
  difficulty: z.string().default('medium'),
  deadline: z.string().default('48 hours'),
});

export type MissionBriefingResponse = z.infer<typeof MissionBriefingResponseSchema>;

export const OpeningResponseSchema = z.object({
  opening_narrative: z.string().min(1),
});

export type OpeningResponse = z.infer<typeof OpeningResponseSchema>;

export const GeneratedChoiceSchema = z.object({
  text: z.string().min(1),
  consequence: z.string().default(''),
  character_used: z.string().default('Unknown'),
  risk_level: z.string().default('medium'),
});

export const ChoicesResponseSchema = z.object({
  choices: z.array(GeneratedChoiceSchema).min(3),
});

export type ChoicesResponse = z.infer<typeof ChoicesResponseSchema>;

/** Shared by continuation and custom-response requests */
export const NarrativeResponseSchema = z.object({
  narrative_text: z.string().min(1),
});

export type NarrativeResponse = z.infer<typeof NarrativeResponseSchema>;
