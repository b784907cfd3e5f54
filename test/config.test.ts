import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/lambda/shared/config';

describe('loadConfig', () => {
  it('fills in defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      PLAYERS_TABLE_NAME: 'DeadDrop-Players',
      MISSIONS_TABLE_NAME: 'DeadDrop-Missions',
      STORIES_TABLE_NAME: 'DeadDrop-Stories',
      NODES_TABLE_NAME: 'DeadDrop-StoryNodes',
      CHOICES_TABLE_NAME: 'DeadDrop-StoryChoices',
      CHARACTERS_TABLE_NAME: 'DeadDrop-Characters',
      TRANSACTIONS_TABLE_NAME: 'DeadDrop-Transactions',
      BEDROCK_DEFAULT_MODEL_ID: 'us.anthropic.claude-haiku-4-5-20251001-v1:0',
      BEDROCK_MODEL_OVERRIDES: {},
      GENERATION_TIMEOUT_MS: 60000,
      GENERATION_MAX_TOKENS: 2000,
      GENERATION_TEMPERATURE: 0.8,
    });
  });

  it('coerces numeric settings and parses model overrides', () => {
    const config = loadConfig({
      GENERATION_TIMEOUT_MS: '15000',
      BEDROCK_MODEL_OVERRIDES: '{"choices":"haiku","fullMission":"sonnet"}',
    });

    expect(config.GENERATION_TIMEOUT_MS).toBe(15000);
    expect(config.BEDROCK_MODEL_OVERRIDES).toEqual({ choices: 'haiku', fullMission: 'sonnet' });
  });

  it('rejects overrides that are not JSON', () => {
    expect(() => loadConfig({ BEDROCK_MODEL_OVERRIDES: 'choices=haiku' })).toThrow(
      'Invalid environment configuration: BEDROCK_MODEL_OVERRIDES: must be a JSON object',
    );
  });

  it('rejects overrides for unknown request kinds', () => {
    expect(() => loadConfig({ BEDROCK_MODEL_OVERRIDES: '{"epilogue":"opus"}' })).toThrow(
      /BEDROCK_MODEL_OVERRIDES: epilogue: Invalid enum value/,
    );
  });

  it('rejects a generation timeout the 90 s Lambda timeout could not accommodate', () => {
    expect(loadConfig({ GENERATION_TIMEOUT_MS: '85000' }).GENERATION_TIMEOUT_MS).toBe(85000);
    expect(() => loadConfig({ GENERATION_TIMEOUT_MS: '90000' })).toThrow(/GENERATION_TIMEOUT_MS/);
    expect(() => loadConfig({ GENERATION_TIMEOUT_MS: '3000000000' })).toThrow(/GENERATION_TIMEOUT_MS/);
  });

  it('rejects a temperature out of range', () => {
    expect(() => loadConfig({ GENERATION_TEMPERATURE: '1.5' })).toThrow(/GENERATION_TEMPERATURE/);
  });
});
