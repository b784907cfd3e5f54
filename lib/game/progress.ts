import type { Mission } from '../types/mission';
import type { PlayerProgress } from '../types/player';
import type { CurrencyAmounts } from '../types/currency';
import type { LedgerEntry } from '../types/transaction';
import { fail, ok, type GameResult } from '../types/result';
import { createUnitOfWork, storedVersion, type GameStore } from '../lambda/shared/store';
import {
  STARTING_BALANCES,
  amountEntries,
  canAfford,
  credit,
  ledgerEntries,
  mergeBalances,
  singleAmount,
} from './ledger';
import { commitUnit, guarded } from './persistence';
import type { PlayerLocks } from './player-lock';
import type { Runtime } from './runtime';

export type MissionOutcome = 'completed' | 'failed';

export interface AffordabilityCheck {
  choiceId: string;
  affordable: boolean;
  requirement: CurrencyAmounts;
  balances: CurrencyAmounts;
}

/** Player id for an authenticated identity. Guests use a bare random id. */
export function authenticatedPlayerId(identityId: string): string {
  return `user_${identityId}`;
}

/** A fresh record with starting balances and nothing else. `version` 0 means unsaved. */
export function newProgress(playerId: string, now: Date, authenticatedUserId?: string): PlayerProgress {
  const timestamp = now.toISOString();
  return {
    playerId,
    authenticatedUserId,
    level: 1,
    experiencePoints: 0,
    choiceHistory: [],
    encounteredCharacters: [],
    activeMissions: [],
    completedMissions: [],
    failedMissions: [],
    currencyBalances: { ...STARTING_BALANCES },
    gameState: {},
    version: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Union preserving first-seen order. */
export function union(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])];
}

/**
 * Player progress: the record's lifecycle outside of story play. Creation,
 * merging a guest session into an identity, mission outcomes and balance
 * checks.
 */
export class ProgressService {
  constructor(
    private readonly store: GameStore,
    private readonly locks: PlayerLocks,
    private readonly runtime: Runtime,
  ) {}

  getOrCreateProgress(playerId: string): Promise<GameResult<PlayerProgress>> {
    return this.locks.withLock(playerId, () =>
      guarded('getOrCreateProgress', () => this.loadOrCreate(playerId)),
    );
  }

  /**
   * Folds a guest's record into the identity's record and deletes the guest.
   * Balances add up, history runs identity-first then guest, character and
   * mission lists are unioned, and the guest's story position wins when the
   * guest has one. Creates the identity's record first if it has none.
   */
  mergeGuestProgress(guestPlayerId: string, identityId: string): Promise<GameResult<PlayerProgress>> {
    const targetId = authenticatedPlayerId(identityId);
    if (guestPlayerId === targetId) {
      return Promise.resolve(fail('InvalidRequest', 'A player cannot be merged into itself'));
    }

    // Fixed lock order so two opposite merges cannot deadlock
    const [first, second] = [guestPlayerId, targetId].sort();
    return this.locks.withLock(first, () =>
      this.locks.withLock(second, () =>
        guarded('mergeGuestProgress', () => this.merge(guestPlayerId, targetId, identityId)),
      ),
    );
  }

  recordMissionOutcome(
    playerId: string,
    missionId: string,
    outcome: MissionOutcome,
  ): Promise<GameResult<{ progress: PlayerProgress; mission: Mission }>> {
    return this.locks.withLock(playerId, () =>
      guarded<{ progress: PlayerProgress; mission: Mission }>('recordMissionOutcome', async () => {
        const progress = await this.store.getProgress(playerId);
        if (!progress) return fail('NotFound', `Player ${playerId} not found`);

        const mission = await this.store.getMission(missionId);
        if (!mission || mission.playerId !== playerId) {
          return fail('NotFound', `Mission ${missionId} not found`);
        }
        if (mission.status !== 'active' || !progress.activeMissions.includes(missionId)) {
          return fail('InvalidRequest', `Mission ${missionId} is already ${mission.status}`);
        }

        const now = this.runtime.now();
        const unit = createUnitOfWork();
        const updatedMission: Mission = { ...mission, status: outcome, completedAt: now.toISOString() };

        let balances = progress.currencyBalances;
        if (outcome === 'completed') {
          balances = credit(balances, mission.rewardCurrency, mission.rewardAmount);
          unit.transactions.push(
            ...ledgerEntries({
              playerId,
              transactionType: 'mission_reward',
              amounts: singleAmount(mission.rewardCurrency, mission.rewardAmount),
              description: `Mission reward: ${mission.title}`,
              now,
              newId: this.runtime.newId,
            }),
          );
        }

        const updated: PlayerProgress = {
          ...progress,
          currencyBalances: balances,
          activeMissions: progress.activeMissions.filter((id) => id !== missionId),
          completedMissions:
            outcome === 'completed' ? union(progress.completedMissions, [missionId]) : progress.completedMissions,
          failedMissions: outcome === 'failed' ? union(progress.failedMissions, [missionId]) : progress.failedMissions,
          updatedAt: now.toISOString(),
        };
        const write = { record: updated, isNew: false };
        unit.progress.push(write);
        unit.missions.push(updatedMission);

        const committed = await commitUnit(this.store, unit, 'recordMissionOutcome', playerId);
        if (!committed.success) return committed;

        return ok({ progress: { ...updated, version: storedVersion(write) }, mission: updatedMission });
      }),
    );
  }

  /** Read-only: can the player pay for this catalog choice right now? */
  canAffordChoice(playerId: string, choiceId: string): Promise<GameResult<AffordabilityCheck>> {
    return guarded<AffordabilityCheck>('canAffordChoice', async () => {
      const progress = await this.store.getProgress(playerId);
      if (!progress) return fail('NotFound', `Player ${playerId} not found`);
      const choice = await this.store.getChoice(choiceId);
      if (!choice) return fail('NotFound', `Choice ${choiceId} not found`);

      return ok({
        choiceId,
        affordable: canAfford(progress.currencyBalances, choice.currencyRequirements),
        requirement: choice.currencyRequirements,
        balances: progress.currencyBalances,
      });
    });
  }

  listTransactions(playerId: string): Promise<GameResult<LedgerEntry[]>> {
    return guarded('listTransactions', async () => ok(await this.store.listTransactions(playerId)));
  }

  // ============================================
  // Helpers
  // ============================================

  private async loadOrCreate(playerId: string): Promise<GameResult<PlayerProgress>> {
    const existing = await this.store.getProgress(playerId);
    if (existing) return ok(existing);

    const record = newProgress(playerId, this.runtime.now());
    const write = { record, isNew: true };
    const unit = createUnitOfWork();
    unit.progress.push(write);

    const committed = await commitUnit(this.store, unit, 'createProgress', playerId);
    if (!committed.success) {
      // Another process may have created it first
      const raced = await this.store.getProgress(playerId);
      return raced ? ok(raced) : committed;
    }
    return ok({ ...record, version: storedVersion(write) });
  }

  private async merge(guestId: string, targetId: string, identityId: string): Promise<GameResult<PlayerProgress>> {
    const guest = await this.store.getProgress(guestId);
    if (!guest) return fail('NotFound', `Player ${guestId} not found`);

    const now = this.runtime.now();
    const existing = await this.store.getProgress(targetId);
    const target = existing ?? newProgress(targetId, now, identityId);
    const guestHasPosition = guest.currentNodeId !== undefined;

    const merged: PlayerProgress = {
      ...target,
      authenticatedUserId: identityId,
      currentNodeId: guestHasPosition ? guest.currentNodeId : target.currentNodeId,
      currentStoryId: guestHasPosition ? guest.currentStoryId : target.currentStoryId,
      gameState: guestHasPosition ? guest.gameState : target.gameState,
      level: Math.max(target.level, guest.level),
      experiencePoints: Math.max(target.experiencePoints, guest.experiencePoints),
      choiceHistory: [...target.choiceHistory, ...guest.choiceHistory],
      encounteredCharacters: union(target.encounteredCharacters, guest.encounteredCharacters),
      activeMissions: union(target.activeMissions, guest.activeMissions),
      completedMissions: union(target.completedMissions, guest.completedMissions),
      failedMissions: union(target.failedMissions, guest.failedMissions),
      currencyBalances: mergeBalances(target.currencyBalances, guest.currencyBalances),
      updatedAt: now.toISOString(),
    };

    const write = { record: merged, isNew: existing === null };
    const unit = createUnitOfWork();
    unit.progress.push(write);
    unit.deletedProgress.push({ playerId: guestId, expectedVersion: guest.version });
    // The guest's missions move with the record, or the merged player could not play them
    const guestMissionIds = union(guest.activeMissions, [...guest.completedMissions, ...guest.failedMissions]);
    for (const missionId of guestMissionIds) {
      const mission = await this.store.getMission(missionId);
      if (mission && mission.playerId === guestId) {
        unit.missions.push({ ...mission, playerId: targetId });
      }
    }
    unit.transactions.push(
      ...ledgerEntries({
        playerId: targetId,
        transactionType: 'session_merge',
        amounts: guest.currencyBalances,
        description: `Merged from guest session ${guestId}`,
        now,
        newId: this.runtime.newId,
      }),
    );

    const committed = await commitUnit(this.store, unit, 'mergeGuestProgress', targetId);
    if (!committed.success) return committed;

    console.log(
      JSON.stringify({
        event: 'session_merged',
        guestPlayerId: guestId,
        playerId: targetId,
        createdTarget: existing === null,
        missionsMoved: unit.missions.length,
        mergedKinds: amountEntries(guest.currencyBalances).map(([kind]) => kind),
      }),
    );
    return ok({ ...merged, version: storedVersion(write) });
  }
}
