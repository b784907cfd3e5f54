import type { Character } from '../types/character';

/**
 * Prompt construction for each generation request kind.
 *
 * Wording is free to change; the JSON field names each prompt asks for are
 * fixed by the response schemas in generation-schemas.ts.
 */

// ============================================
// Requests
// ============================================

export interface PlayerProfile {
  name: string;
  /** Pronoun set, e.g. "she/her" */
  gender: string;
}

export interface FullMissionRequest {
  kind: 'fullMission';
  giver: Character;
  target: Character;
  partner: Character;
  extra: Character;
  player: PlayerProfile;
  narrativeStyle: string;
  mood: string;
}

export interface MissionBriefingRequest {
  kind: 'missionBriefing';
  giver: Character;
}

export interface OpeningRequest {
  kind: 'opening';
  missionTitle: string;
  missionDescription: string;
  giver?: Character;
}

export interface ChoicesRequest {
  kind: 'choices';
  narrative: string;
  character?: Character;
  gameState: Record<string, unknown>;
  availableCharacters: Character[];
}

export interface ContinuationRequest {
  kind: 'continuation';
  previousNarrative: string;
  action: string;
  character?: Character;
  gameState: Record<string, unknown>;
}

export interface CustomResponseRequest {
  kind: 'customResponse';
  currentNarrative: string;
  customAction: string;
  character?: Character;
  gameState: Record<string, unknown>;
}

export type GenerationRequest =
  | FullMissionRequest
  | MissionBriefingRequest
  | OpeningRequest
  | ChoicesRequest
  | ContinuationRequest
  | CustomResponseRequest;

export interface Prompt {
  systemPrompt: string;
  userPrompt: string;
}

// ============================================
// Prompt builders
// ============================================

const SYSTEM_PROMPT = `You are a game narrative designer for an irreverent espionage choose-your-own-adventure game. The player is a disavowed spy: bold, improvising, always one step from disaster.

You MUST respond with a single valid JSON object and nothing else. Do not put literal line breaks inside string values; use \\n instead. Keep every field within the length stated for it.`;

const PRONOUNS: Record<string, string> = {
  'he/him': 'he',
  'she/her': 'she',
  'they/them': 'they',
};

export function buildPrompt(request: GenerationRequest): Prompt {
  switch (request.kind) {
    case 'fullMission':
      return { systemPrompt: SYSTEM_PROMPT, userPrompt: fullMissionPrompt(request) };
    case 'missionBriefing':
      return { systemPrompt: SYSTEM_PROMPT, userPrompt: missionBriefingPrompt(request) };
    case 'opening':
      return { systemPrompt: SYSTEM_PROMPT, userPrompt: openingPrompt(request) };
    case 'choices':
      return { systemPrompt: SYSTEM_PROMPT, userPrompt: choicesPrompt(request) };
    case 'continuation':
      return { systemPrompt: SYSTEM_PROMPT, userPrompt: continuationPrompt(request) };
    case 'customResponse':
      return { systemPrompt: SYSTEM_PROMPT, userPrompt: customResponsePrompt(request) };
  }
}

function fullMissionPrompt(request: FullMissionRequest): string {
  const { giver, target, partner, extra, player, narrativeStyle, mood } = request;
  const pronoun = PRONOUNS[player.gender] ?? 'they';

  return `Create a mission with its opening scene and three first choices.

CHARACTERS:
- Player: ${player.name} (refer to the player as "${pronoun}")
- Mission Giver: ${giver.characterName} - ${describeCharacter(giver)}
- Target: ${target.characterName} - ${describeCharacter(target)}
- Partner: ${partner.characterName} - ${describeCharacter(partner)}
- Additional Character: ${extra.characterName} - ${describeCharacter(extra)}

REQUIREMENTS:
1. ${giver.characterName} briefs ${player.name} on a mission against ${target.characterName}.
2. ${partner.characterName} is assigned as ${player.name}'s partner.
3. The opening narrative is written as ${narrativeStyle}, with a ${mood} mood.
4. Exactly 3 choices, each built around one character (${partner.characterName}, ${extra.characterName}, or the player alone), ordered cautious, moderate, aggressive.

Respond with JSON in exactly this shape:
{
  "mission_title": "Brief mission title (<=200 chars)",
  "mission_description": "2-3 paragraph briefing (<=1000 chars)",
  "objective": "Clear, actionable goal (<=255 chars)",
  "difficulty": "low" | "medium" | "high",
  "deadline": "Narrative time pressure (<=200 chars)",
  "setting": "Concise location description (<=255 chars)",
  "narrative_style": "${narrativeStyle}",
  "mood": "${mood}",
  "opening_narrative": "2-3 paragraphs setting the scene (<=1500 chars)",
  "choices": [
    { "text": "First option", "character_used": "${partner.characterName}", "risk_level": "low", "next_node_summary": "What follows (<=255 chars)" },
    { "text": "Second option", "character_used": "${extra.characterName}", "risk_level": "medium", "next_node_summary": "What follows (<=255 chars)" },
    { "text": "Third option", "character_used": "${player.name}", "risk_level": "high", "next_node_summary": "What follows (<=255 chars)" }
  ]
}`;
}

function missionBriefingPrompt(request: MissionBriefingRequest): string {
  const { giver } = request;
  return `Write a mission briefing delivered by this character:
Name: ${giver.characterName}
Role: ${giver.characterRole ?? 'unknown'}
${describeCharacter(giver)}

The mission should fit the character's personality and carry high stakes.

Respond with JSON in exactly this shape:
{
  "title": "Mission title (<=200 chars)",
  "description": "2-3 sentence description",
  "objective": "Clear objective statement",
  "difficulty": "easy" | "medium" | "hard",
  "deadline": "Narrative deadline (<=200 chars)"
}`;
}

function openingPrompt(request: OpeningRequest): string {
  return `Write the opening scene for this mission.
Mission: ${request.missionTitle}
Description: ${request.missionDescription}
Mission Giver: ${request.giver?.characterName ?? 'an unnamed handler'}

In 2-3 paragraphs: set a tense scene, have the mission giver brief the player, and end just before the player's first decision.

Respond with JSON in exactly this shape:
{
  "opening_narrative": "The opening scene (<=1500 chars)"
}`;
}

function choicesPrompt(request: ChoicesRequest): string {
  const pool = request.availableCharacters
    .map((c) => `- ${c.characterName}: ${(c.description ?? '').slice(0, 100)}`)
    .join('\n');

  return `Offer the player three choices for what happens next.
Current narrative: ${request.narrative}
${request.character ? `Current character: ${request.character.characterName} (${request.character.characterRole ?? 'unknown role'})` : ''}
Game context: ${formatGameState(request.gameState)}
${pool ? `\nCharacters available as allies, contacts or helpers:\n${pool}\n` : ''}
Each choice is 1-2 actionable sentences that brings in one available character. Order them cautious, moderate, aggressive.

Respond with JSON in exactly this shape:
{
  "choices": [
    { "text": "Choice text naming the character", "consequence": "Likely outcome", "character_used": "Character Name", "risk_level": "low" },
    { "text": "Choice text naming the character", "consequence": "Likely outcome", "character_used": "Character Name", "risk_level": "medium" },
    { "text": "Choice text naming the character", "consequence": "Likely outcome", "character_used": "Character Name", "risk_level": "high" }
  ]
}`;
}

function continuationPrompt(request: ContinuationRequest): string {
  return `Continue the story after the player's choice.
Previous narrative: ${request.previousNarrative}
Player's action: ${request.action}
${request.character ? `Current character: ${request.character.characterName}` : ''}
Game context: ${formatGameState(request.gameState)}

Show the immediate consequences, add a complication or revelation, and set up the next decision.

Respond with JSON in exactly this shape:
{
  "narrative_text": "The continuation (<=1500 chars)"
}`;
}

function customResponsePrompt(request: CustomResponseRequest): string {
  return `The player has improvised their own action.
Current situation: ${request.currentNarrative}
Player's custom action: ${request.customAction}
${request.character ? `Current character: ${request.character.characterName}` : ''}
Game context: ${formatGameState(request.gameState)}

Incorporate the action as the player wrote it, show realistic consequences (good, bad or mixed), and move the plot somewhere interesting.

Respond with JSON in exactly this shape:
{
  "narrative_text": "The response to the custom action (<=1500 chars)"
}`;
}

// ============================================
// Helpers
// ============================================

/**
 * One-line sketch of a character for prompt context: image reference,
 * traits and backstory, whichever are present.
 */
export function describeCharacter(character: Character): string {
  const parts: string[] = [
    character.imageUrl
      ? `[See character image at ${character.imageUrl}]`
      : character.description ?? 'Character appearance not described',
  ];

  const traits = formatTraits(character.characterTraits);
  if (traits) parts.push(`TRAITS: ${traits}.`);
  if (character.backstory) parts.push(`BACKSTORY: ${character.backstory}`);

  return parts.join(' ');
}

function formatTraits(traits: Character['characterTraits']): string {
  if (!traits) return '';
  if (Array.isArray(traits)) return traits.join(', ');
  return Object.entries(traits)
    .map(([trait, note]) => (note.trim() ? `${trait}: ${note}` : trait))
    .join(', ');
}

function formatGameState(gameState: Record<string, unknown>): string {
  return Object.keys(gameState).length > 0 ? JSON.stringify(gameState) : 'Starting mission';
}
