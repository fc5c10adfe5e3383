import { describe, it, expect } from '@jest/globals';
import { CompletionContext, RewardEngine } from '../../src/services/reward-engine';
import {
  CharacterClass,
  ConfirmationKind,
  ConfirmationStatus,
  IBond,
  IRoutineBundle,
  ItemRarity,
  MaterialType,
  RoutineTimeOfDay,
  StatType,
  TaskCategory,
  TaskStatus,
  VerificationTier,
} from '../../src/types';
import { T0, makeCharacter, makeTask, scriptedRng } from '../helpers';

function context(overrides: Partial<CompletionContext> = {}): CompletionContext {
  return {
    now: T0,
    rng: scriptedRng([]),
    bond: null,
    partnerTask: null,
    routineBundles: [],
    habits: [],
    recentCompletions: [],
    activityConfirmationAvailable: false,
    ...overrides,
  };
}

const bond: IBond = {
  id: 'bond-1',
  memberIds: ['char-1', 'char-2'],
  bondLevel: 1,
  bondExp: 0,
  createdAt: T0,
};

describe('Reward Engine', () => {
  describe('complete', () => {
    it('should grant the custom base reward for an unverified task', () => {
      const character = makeCharacter();
      const task = makeTask({ customExp: 10, customGold: 5, category: TaskCategory.MENTAL });

      const effects = RewardEngine.complete(task, character, context());

      expect(effects.result.expGained).toBe(10);
      expect(effects.result.goldGained).toBe(5);
      expect(effects.result.verificationTier).toBe(VerificationTier.NONE);
      expect(effects.result.levelUpAvailable).toBe(false);
      expect(effects.result.lootDropped).toBeUndefined();
      expect(effects.result.bonusStatGains).toEqual([{ stat: StatType.WISDOM, amount: 1 }]);
      expect(effects.character.exp).toBe(10);
      expect(effects.character.gold).toBe(5);
      expect(effects.character.stats.wisdom).toBe(6);
      expect(effects.character.tasksCompleted).toBe(1);
      expect(effects.character.streak).toEqual({ current: 1, longest: 1, lastActiveDay: '2025-03-10' });
      expect(effects.task.status).toBe(TaskStatus.COMPLETED);
    });

    it('should leave its inputs untouched', () => {
      const character = makeCharacter();
      const task = makeTask();
      RewardEngine.complete(task, character, context());
      expect(character.exp).toBe(0);
      expect(task.status).toBe(TaskStatus.IN_PROGRESS);
    });

    it('should scale the base reward with level', () => {
      const character = makeCharacter({ level: 3, exp: 300 });
      const effects = RewardEngine.complete(makeTask(), character, context());
      expect(effects.result.expGained).toBe(24);
      expect(effects.result.goldGained).toBe(12);
    });

    it('should add the class affinity bonus', () => {
      const character = makeCharacter({ characterClass: CharacterClass.WARRIOR });
      const effects = RewardEngine.complete(makeTask(), character, context());
      expect(effects.result.classAffinityBonusExp).toBe(3);
      expect(effects.result.expGained).toBe(23);
    });

    it('should report a level-up once the threshold is crossed', () => {
      const effects = RewardEngine.complete(makeTask(), makeCharacter({ exp: 90 }), context());
      expect(effects.result.levelUpAvailable).toBe(true);
      expect(effects.character.level).toBe(1);
    });

    it('should pay the routine bonus when the last habit of a bundle is done', () => {
      const habits = ['h1', 'h2', 'h3'].map((id) =>
        makeTask({ id, isHabit: true, isRecurring: true, habitCompletedOn: id === 'h3' ? undefined : '2025-03-10' })
      );
      const bundle: IRoutineBundle = {
        id: 'routine-1',
        ownerId: 'char-1',
        name: 'Morning',
        timeOfDay: RoutineTimeOfDay.MORNING,
        habitIds: ['h1', 'h2', 'h3'],
        isArchived: false,
        createdAt: T0,
      };

      const effects = RewardEngine.complete(
        habits[2],
        makeCharacter(),
        context({ routineBundles: [bundle], habits })
      );

      expect(effects.result.routineBundleCompleted).toBe(true);
      expect(effects.result.routineBonusExp).toBe(30);
      expect(effects.result.expGained).toBe(50);
    });

    it('should pay the co-op bonus when the partner already finished', () => {
      const task = makeTask({ isCoop: true, coopPairId: 'pair-1' });
      const partnerTask = makeTask({
        id: 'task-2',
        ownerId: 'char-2',
        isCoop: true,
        coopPairId: 'pair-1',
        status: TaskStatus.COMPLETED,
      });

      const effects = RewardEngine.complete(task, makeCharacter(), context({ bond, partnerTask }));

      expect(effects.result.coopBonusExp).toBe(10);
      expect(effects.result.coopBonusGold).toBe(5);
      expect(effects.result.coopBondExp).toBe(25);
      expect(effects.result.coopPartnerCompleted).toBe(true);
      expect(effects.result.expGained).toBe(30);
      expect(effects.result.goldGained).toBe(15);
      expect(effects.task.coopBonusAwarded).toBe(true);
      expect(effects.partnerTask?.coopBonusAwarded).toBe(true);
      expect(effects.bond?.bondExp).toBe(25);
    });

    it('should not pay the co-op bonus while the partner is still working', () => {
      const task = makeTask({ isCoop: true, coopPairId: 'pair-1' });
      const partnerTask = makeTask({ id: 'task-2', ownerId: 'char-2', isCoop: true, coopPairId: 'pair-1' });

      const effects = RewardEngine.complete(task, makeCharacter(), context({ bond, partnerTask }));

      expect(effects.result.coopBonusExp).toBe(0);
      expect(effects.partnerTask).toBeUndefined();
      expect(effects.bond).toBeUndefined();
    });

    it('should drop equipment on a low roll', () => {
      const effects = RewardEngine.complete(
        makeTask(),
        makeCharacter(),
        context({ rng: scriptedRng([0.05, 0.1, 0, 0]) })
      );
      const drop = effects.result.lootDropped;
      expect(drop?.type).toBe('equipment');
      if (drop?.type === 'equipment') {
        expect(drop.item).toMatchObject({
          name: 'Worn Blade',
          tier: 1,
          rarity: ItemRarity.COMMON,
          bonusStat: StatType.STRENGTH,
          bonusAmount: 1,
        });
      }
      expect(effects.character.inventory.equipment).toHaveLength(1);
    });

    it('should drop materials and consumables in their bands', () => {
      const material = RewardEngine.complete(
        makeTask(),
        makeCharacter(),
        context({ rng: scriptedRng([0.2, 0.5, 0.5, 0]) })
      );
      expect(material.result.lootDropped).toEqual({
        type: 'material',
        material: MaterialType.HIDE,
        rarity: ItemRarity.COMMON,
        quantity: 1,
      });

      const consumable = RewardEngine.complete(makeTask(), makeCharacter(), context({ rng: scriptedRng([0.5]) }));
      expect(consumable.result.lootDropped).toEqual({ type: 'consumable', name: 'Trail Mix' });
      expect(consumable.character.inventory.consumables).toEqual({ 'Trail Mix': 1 });
    });

    it('should issue an activity confirmation for physical tasks', () => {
      const effects = RewardEngine.complete(
        makeTask(),
        makeCharacter(),
        context({ activityConfirmationAvailable: true })
      );
      expect(effects.confirmation).toMatchObject({
        kind: ConfirmationKind.ACTIVITY,
        expDelta: 3,
        goldDelta: 0,
        bondExpDelta: 0,
        status: ConfirmationStatus.PENDING,
      });
      expect(effects.result.pendingConfirmation).toBe(effects.confirmation?.token);
    });

    it('should issue a partner confirmation for assigned tasks', () => {
      const effects = RewardEngine.complete(
        makeTask({ isFromPartner: true, category: TaskCategory.SOCIAL }),
        makeCharacter(),
        context({ bond })
      );
      expect(effects.confirmation).toMatchObject({
        kind: ConfirmationKind.PARTNER,
        bondId: 'bond-1',
        expDelta: 3,
        goldDelta: 2,
        bondExpDelta: 15,
      });
    });
  });

  describe('failHabit', () => {
    it('should floor the penalty at zero', () => {
      const penalty = RewardEngine.failHabit(
        makeTask({ isHabit: true, status: TaskStatus.PENDING }),
        makeCharacter({ exp: 5, gold: 3 }),
        T0
      );
      expect(penalty.expLost).toBe(5);
      expect(penalty.goldLost).toBe(3);
      expect(penalty.character.exp).toBe(0);
      expect(penalty.character.gold).toBe(0);
      expect(penalty.task.status).toBe(TaskStatus.FAILED);
    });

    it('should charge the full base when affordable', () => {
      const penalty = RewardEngine.failHabit(
        makeTask({ isHabit: true }),
        makeCharacter({ exp: 50, gold: 40 }),
        T0
      );
      expect(penalty.character.exp).toBe(30);
      expect(penalty.character.gold).toBe(30);
    });
  });

  describe('resolveConfirmation', () => {
    const pending = {
      token: 'token-1',
      taskId: 'task-1',
      characterId: 'char-1',
      bondId: 'bond-1',
      kind: ConfirmationKind.PARTNER,
      expDelta: 3,
      goldDelta: 2,
      bondExpDelta: 15,
      status: ConfirmationStatus.PENDING,
      createdAt: T0,
    };

    it('should apply the delta once', () => {
      const first = RewardEngine.resolveConfirmation(pending, makeCharacter({ exp: 10 }), bond, true, false, T0);
      expect(first.outcome).toEqual({
        token: 'token-1',
        status: ConfirmationStatus.APPLIED,
        expApplied: 3,
        goldApplied: 2,
        bondExpApplied: 15,
        levelUpAvailable: false,
      });
      expect(first.character.exp).toBe(13);
      expect(first.bond?.bondExp).toBe(15);

      const second = RewardEngine.resolveConfirmation(first.confirmation, first.character, bond, true, false, T0);
      expect(second.outcome.status).toBe(ConfirmationStatus.APPLIED);
      expect(second.outcome.expApplied).toBe(0);
      expect(second.character.exp).toBe(13);
    });

    it('should discard rejected or invalidated confirmations', () => {
      const rejected = RewardEngine.resolveConfirmation(pending, makeCharacter(), bond, false, false, T0);
      expect(rejected.outcome.status).toBe(ConfirmationStatus.DISCARDED);
      expect(rejected.character.exp).toBe(0);

      const late = RewardEngine.resolveConfirmation(pending, makeCharacter(), bond, true, true, T0);
      expect(late.outcome.status).toBe(ConfirmationStatus.DISCARDED);
      expect(late.outcome.expApplied).toBe(0);
    });
  });
});
