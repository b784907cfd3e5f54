import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { Mission } from '../lib/types';
import { STARTING_BALANCES } from '../lib/game/ledger';
import { authenticatedPlayerId, union } from '../lib/game/progress';
import { createHarness, makeChoice, makeProgress, type Harness } from './support/fixtures';

const TIMESTAMP = '2026-03-01T12:00:00.000Z';

function makeMission(overrides: Partial<Mission> = {}): Mission {
  return {
    missionId: 'mission-1',
    playerId: 'player-1',
    title: 'Operation Nightjar',
    description: 'A stolen cipher key is changing hands in Lisbon.',
    giverId: 'char_handler',
    objective: 'Recover the cipher key',
    difficulty: 'medium',
    rewardCurrency: '💎',
    rewardAmount: 3,
    deadline: '48 hours',
    status: 'active',
    createdAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('ProgressService', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getOrCreateProgress', () => {
    it('creates a record with starting balances on first sight', async () => {
      const result = await h.services.progress.getOrCreateProgress('guest-1');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toMatchObject({
        playerId: 'guest-1',
        level: 1,
        experiencePoints: 0,
        currencyBalances: STARTING_BALANCES,
        version: 1,
        createdAt: TIMESTAMP,
      });
      expect(h.store.progress.get('guest-1')).toEqual(result.data);
    });

    it('returns an existing record untouched', async () => {
      h.store.seed({ progress: [makeProgress()] });

      const result = await h.services.progress.getOrCreateProgress('player-1');

      expect(result).toEqual({ success: true, data: makeProgress() });
      expect(h.store.commits).toBe(0);
    });

    it('returns the record another process created first', async () => {
      const winner = makeProgress({ playerId: 'guest-1', currencyBalances: { '💵': 7 } });
      h.store.beforeNextCommit(() => {
        h.store.seed({ progress: [winner] });
      });

      const result = await h.services.progress.getOrCreateProgress('guest-1');

      expect(result).toEqual({ success: true, data: winner });
    });
  });

  describe('mergeGuestProgress', () => {
    const guest = makeProgress({
      playerId: 'guest-1',
      level: 3,
      experiencePoints: 40,
      currencyBalances: { '💵': 10 },
      choiceHistory: [{ choiceId: 'c-2', choiceText: 'Guest move', nodeId: 'n-2', timestamp: '2026-02-03T00:00:00.000Z', custom: false }],
      encounteredCharacters: ['char_partner', 'char_villain'],
      activeMissions: ['m-2'],
      currentNodeId: 'n-3',
      currentStoryId: 's-2',
      gameState: { alias: 'Nightjar' },
    });
    const identity = makeProgress({
      playerId: 'user_abc',
      authenticatedUserId: 'abc',
      level: 2,
      experiencePoints: 90,
      currencyBalances: { '💵': 50, '💎': 50 },
      choiceHistory: [{ choiceId: 'c-1', choiceText: 'Own move', nodeId: 'n-1', timestamp: '2026-02-02T00:00:00.000Z', custom: false }],
      encounteredCharacters: ['char_handler', 'char_partner'],
      activeMissions: ['m-1'],
      completedMissions: ['m-0'],
      currentNodeId: 'n-1',
      currentStoryId: 's-1',
    });

    it('adds balances, concatenates history and unions the lists', async () => {
      h.store.seed({ progress: [guest, identity] });

      const result = await h.services.progress.mergeGuestProgress('guest-1', 'abc');

      expect(result.success).toBe(true);
      const merged = h.store.progress.get('user_abc');
      expect(merged?.currencyBalances).toEqual({ '💵': 60, '💎': 50 });
      expect(merged?.choiceHistory.map((e) => e.choiceId)).toEqual(['c-1', 'c-2']);
      expect(merged?.encounteredCharacters).toEqual(['char_handler', 'char_partner', 'char_villain']);
      expect(merged?.activeMissions).toEqual(['m-1', 'm-2']);
      expect(merged?.completedMissions).toEqual(['m-0']);
      expect(merged).toMatchObject({
        level: 3,
        experiencePoints: 90,
        currentNodeId: 'n-3',
        currentStoryId: 's-2',
        gameState: { alias: 'Nightjar' },
        version: 2,
      });
      expect(result.success && result.data).toEqual(merged);
      expect(h.store.progress.has('guest-1')).toBe(false);
    });

    it('records the merged amounts in the ledger', async () => {
      h.store.seed({ progress: [guest, identity] });

      await h.services.progress.mergeGuestProgress('guest-1', 'abc');

      expect(h.store.transactions).toEqual([
        {
          transactionId: `${TIMESTAMP}#id-1`,
          playerId: 'user_abc',
          transactionType: 'session_merge',
          currency: '💵',
          amount: 10,
          description: 'Merged from guest session guest-1',
          createdAt: TIMESTAMP,
        },
      ]);
    });

    it("hands the guest's missions to the merged player", async () => {
      h.store.seed({
        progress: [guest, identity],
        missions: [makeMission({ missionId: 'm-2', playerId: 'guest-1' }), makeMission({ missionId: 'm-1', playerId: 'user_abc' })],
      });

      await h.services.progress.mergeGuestProgress('guest-1', 'abc');
      const outcome = await h.services.progress.recordMissionOutcome('user_abc', 'm-2', 'completed');

      expect(h.store.missions.get('m-2')?.playerId).toBe('user_abc');
      expect(outcome.success && outcome.data.mission).toMatchObject({ missionId: 'm-2', playerId: 'user_abc', status: 'completed' });
      expect(outcome.success && outcome.data.progress.completedMissions).toEqual(['m-0', 'm-2']);
    });

    it('keeps the identity position when the guest never started a story', async () => {
      h.store.seed({ progress: [{ ...guest, currentNodeId: undefined, currentStoryId: undefined }, identity] });

      await h.services.progress.mergeGuestProgress('guest-1', 'abc');

      expect(h.store.progress.get('user_abc')).toMatchObject({ currentNodeId: 'n-1', currentStoryId: 's-1', gameState: {} });
    });

    it('creates the identity record when it has none', async () => {
      h.store.seed({ progress: [guest] });

      const result = await h.services.progress.mergeGuestProgress('guest-1', 'abc');

      expect(result.success && result.data).toMatchObject({
        playerId: 'user_abc',
        authenticatedUserId: 'abc',
        version: 1,
        currencyBalances: { ...STARTING_BALANCES, '💵': 60 },
      });
      expect(h.store.progress.has('guest-1')).toBe(false);
    });

    it('rejects merging a player into itself', async () => {
      expect(await h.services.progress.mergeGuestProgress(authenticatedPlayerId('abc'), 'abc')).toEqual({
        success: false,
        error: { kind: 'InvalidRequest', message: 'A player cannot be merged into itself' },
      });
    });

    it('reports a missing guest as NotFound', async () => {
      h.store.seed({ progress: [identity] });

      const result = await h.services.progress.mergeGuestProgress('guest-1', 'abc');

      expect(result.success === false && result.error.kind).toBe('NotFound');
      expect(h.store.progress.get('user_abc')).toEqual(identity);
    });

    it('leaves both records alone when the guest changes mid-merge', async () => {
      h.store.seed({ progress: [guest, identity] });
      h.store.beforeNextCommit(() => {
        h.store.seed({ progress: [{ ...guest, version: 5 }] });
      });

      const result = await h.services.progress.mergeGuestProgress('guest-1', 'abc');

      expect(result.success === false && result.error.kind).toBe('PersistenceFailure');
      expect(h.store.progress.get('user_abc')).toEqual(identity);
      expect(h.store.progress.get('guest-1')?.version).toBe(5);
      expect(h.store.transactions).toEqual([]);
    });
  });

  describe('recordMissionOutcome', () => {
    beforeEach(() => {
      h.store.seed({
        progress: [makeProgress({ activeMissions: ['mission-1'] })],
        missions: [makeMission()],
      });
    });

    it('pays the reward for a completed mission', async () => {
      const result = await h.services.progress.recordMissionOutcome('player-1', 'mission-1', 'completed');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.mission).toMatchObject({ status: 'completed', completedAt: TIMESTAMP });
      expect(result.data.progress).toMatchObject({
        currencyBalances: { '💎': 53, '💵': 50 },
        activeMissions: [],
        completedMissions: ['mission-1'],
        failedMissions: [],
        version: 2,
      });
      expect(h.store.missions.get('mission-1')?.status).toBe('completed');
      expect(h.store.transactions).toMatchObject([
        { transactionType: 'mission_reward', currency: '💎', amount: 3, description: 'Mission reward: Operation Nightjar' },
      ]);
    });

    it('pays nothing for a failed mission', async () => {
      const result = await h.services.progress.recordMissionOutcome('player-1', 'mission-1', 'failed');

      expect(result.success && result.data.progress).toMatchObject({
        currencyBalances: { '💎': 50, '💵': 50 },
        activeMissions: [],
        failedMissions: ['mission-1'],
      });
      expect(h.store.transactions).toEqual([]);
    });

    it('records an outcome only once', async () => {
      await h.services.progress.recordMissionOutcome('player-1', 'mission-1', 'completed');
      const again = await h.services.progress.recordMissionOutcome('player-1', 'mission-1', 'completed');

      expect(again).toEqual({
        success: false,
        error: { kind: 'InvalidRequest', message: 'Mission mission-1 is already completed' },
      });
      expect(h.store.transactions).toHaveLength(1);
    });

    it("hides other players' missions", async () => {
      h.store.seed({ missions: [makeMission({ playerId: 'player-2' })] });

      const result = await h.services.progress.recordMissionOutcome('player-1', 'mission-1', 'completed');

      expect(result.success === false && result.error.kind).toBe('NotFound');
    });
  });

  describe('canAffordChoice', () => {
    beforeEach(() => {
      h.store.seed({ choices: [makeChoice()] });
    });

    it('compares the balances against the choice price', async () => {
      h.store.seed({ progress: [makeProgress()] });

      expect(await h.services.progress.canAffordChoice('player-1', 'choice-1')).toEqual({
        success: true,
        data: {
          choiceId: 'choice-1',
          affordable: true,
          requirement: { '💵': 15 },
          balances: { '💎': 50, '💵': 50 },
        },
      });
    });

    it('reports a shortfall', async () => {
      h.store.seed({ progress: [makeProgress({ currencyBalances: { '💵': 14 } })] });

      const result = await h.services.progress.canAffordChoice('player-1', 'choice-1');

      expect(result.success && result.data.affordable).toBe(false);
    });

    it('reports an unknown choice as NotFound', async () => {
      h.store.seed({ progress: [makeProgress()] });

      const result = await h.services.progress.canAffordChoice('player-1', 'missing');

      expect(result.success === false && result.error.message).toBe('Choice missing not found');
    });
  });

  it('maps a failing read to PersistenceFailure', async () => {
    vi.spyOn(h.store, 'getProgress').mockRejectedValue(new Error('ProvisionedThroughputExceeded'));

    expect(await h.services.progress.canAffordChoice('player-1', 'choice-1')).toEqual({
      success: false,
      error: { kind: 'PersistenceFailure', message: 'canAffordChoice failed' },
    });
  });

  it('lists ledger entries in time order', async () => {
    h.store.seed({ progress: [makeProgress({ activeMissions: ['mission-1'] })], missions: [makeMission()] });
    await h.services.progress.recordMissionOutcome('player-1', 'mission-1', 'completed');

    const result = await h.services.progress.listTransactions('player-1');

    expect(result.success && result.data.map((t) => t.transactionId)).toEqual([`${TIMESTAMP}#id-1`]);
  });
});

describe('union', () => {
  it('keeps first-seen order without duplicates', () => {
    expect(union(['a', 'b'], ['b', 'c', 'a'])).toEqual(['a', 'b', 'c']);
  });
});
