import { v4 as uuidv4 } from 'uuid';
import { QUEST_CONSTANTS } from '@/config';
import {
  AnomalyFlag,
  CharacterClass,
  ConfirmationKind,
  ConfirmationOutcome,
  ConfirmationStatus,
  IBond,
  ICharacter,
  IPendingConfirmation,
  IRoutineBundle,
  ITask,
  RandomSource,
  StatGain,
  StatType,
  TaskCategory,
  TaskCompletionResult,
  TaskStatus,
} from '@/types';
import { canLevelUp, levelProgress, scaledExp, scaledGold } from './reward-curve';
import { VerificationEngine } from './verification';
import { TaskLifecycle } from './task-lifecycle';
import { checkRoutineBundleCompletion } from './routine';
import { addLootToInventory, luckLootBonus, rollTaskLoot } from './loot';
import { gainBondExp, isMember } from './bond';
import { recordActivity } from './streak';
import { dayKey } from '@/utils/day-key';

export const CATEGORY_BONUS_STAT: Record<TaskCategory, StatType> = {
  [TaskCategory.PHYSICAL]: StatType.STRENGTH,
  [TaskCategory.MENTAL]: StatType.WISDOM,
  [TaskCategory.SOCIAL]: StatType.CHARISMA,
  [TaskCategory.HOUSEHOLD]: StatType.DEFENSE,
  [TaskCategory.WELLNESS]: StatType.LUCK,
  [TaskCategory.CREATIVE]: StatType.DEXTERITY,
};

export const CLASS_PRIMARY_STAT: Record<CharacterClass, StatType> = {
  [CharacterClass.WARRIOR]: StatType.STRENGTH,
  [CharacterClass.BERSERKER]: StatType.STRENGTH,
  [CharacterClass.MAGE]: StatType.WISDOM,
  [CharacterClass.SORCERER]: StatType.WISDOM,
  [CharacterClass.ARCHER]: StatType.DEXTERITY,
  [CharacterClass.RANGER]: StatType.DEXTERITY,
  [CharacterClass.PALADIN]: StatType.DEFENSE,
  [CharacterClass.ENCHANTER]: StatType.CHARISMA,
  [CharacterClass.TRICKSTER]: StatType.LUCK,
};

export interface BaseReward {
  exp: number;
  gold: number;
}

export interface CompletionContext {
  now: Date;
  rng: RandomSource;
  bond: IBond | null;
  /** The partner's mirrored instance of a co-op task, if any. */
  partnerTask: ITask | null;
  routineBundles: IRoutineBundle[];
  /** The owner's habits, used for routine bundle checks. */
  habits: ITask[];
  recentCompletions: Date[];
  activityConfirmationAvailable: boolean;
}

/**
 * Everything one completion changes. The inputs are never mutated; the
 * caller persists these copies in a single commit.
 */
export interface CompletionEffects {
  result: TaskCompletionResult;
  task: ITask;
  character: ICharacter;
  bond?: IBond;
  partnerTask?: ITask;
  confirmation?: IPendingConfirmation;
}

export interface HabitPenalty {
  task: ITask;
  character: ICharacter;
  expLost: number;
  goldLost: number;
}

export class RewardEngine {
  static baseReward(task: ITask, level: number): BaseReward {
    return {
      exp: scaledExp(task.customExp ?? QUEST_CONSTANTS.BASE_TASK_EXP, level),
      gold: scaledGold(task.customGold ?? QUEST_CONSTANTS.BASE_TASK_GOLD, level),
    };
  }

  static hasClassAffinity(character: ICharacter, category: TaskCategory): boolean {
    if (!character.characterClass) return false;
    return CLASS_PRIMARY_STAT[character.characterClass] === CATEGORY_BONUS_STAT[category];
  }

  /**
   * The co-op bonus fires when the partner's mirrored instance is already
   * done and neither side of the pair has been awarded yet.
   */
  static coopPartnerDone(task: ITask, partnerTask: ITask | null, bond: IBond | null): partnerTask is ITask {
    if (!task.isCoop || !bond || !partnerTask || task.coopBonusAwarded) return false;
    return (
      partnerTask.id !== task.id &&
      partnerTask.coopPairId === task.coopPairId &&
      partnerTask.ownerId !== task.ownerId &&
      isMember(bond, partnerTask.ownerId) &&
      partnerTask.status === TaskStatus.COMPLETED &&
      !partnerTask.coopBonusAwarded
    );
  }

  /**
   * Complete `task` for `character` and compute the reward. Every bonus is
   * measured against the level-scaled base, in a fixed order:
   * verification, class affinity, routine bundle, co-op, stat, loot.
   */
  static complete(taskIn: ITask, characterIn: ICharacter, ctx: CompletionContext): CompletionEffects {
    const task = structuredClone(taskIn);
    const character = structuredClone(characterIn);
    const bond = ctx.bond ? structuredClone(ctx.bond) : undefined;
    const { now } = ctx;

    const progressBefore = levelProgress(character.exp, character.level);
    const anomalyFlags: AnomalyFlag[] = VerificationEngine.detectAnomalies(ctx.recentCompletions, now);

    // Proof is assessed before the transition so the tier reflects what was captured.
    const assessment = VerificationEngine.assessTier(task, now);
    TaskLifecycle.complete(task, now);

    // 1. Base
    const base = this.baseReward(task, character.level);

    // 2. Verification multiplier (EXP only)
    const verifiedExp = Math.round(base.exp * assessment.multiplier);

    // 3. Class affinity
    const classAffinityBonusExp = this.hasClassAffinity(character, task.category)
      ? Math.round(base.exp * QUEST_CONSTANTS.CLASS_AFFINITY_BONUS)
      : 0;

    // 4. Routine bundle
    const routine = checkRoutineBundleCompletion(task, ctx.routineBundles, ctx.habits, base.exp, now);

    // 5. Co-op
    let coopBonusExp = 0;
    let coopBonusGold = 0;
    let coopBondExp = 0;
    let partnerTask: ITask | undefined;
    if (this.coopPartnerDone(task, ctx.partnerTask, ctx.bond) && bond) {
      partnerTask = structuredClone(ctx.partnerTask);
      coopBonusExp = Math.round(base.exp * QUEST_CONSTANTS.COOP_BONUS);
      coopBonusGold = Math.round(base.gold * QUEST_CONSTANTS.COOP_BONUS);
      coopBondExp = QUEST_CONSTANTS.COOP_BOND_EXP;
      task.coopBonusAwarded = true;
      partnerTask.coopBonusAwarded = true;
      gainBondExp(bond, coopBondExp, now);
    }

    // 6. Stat bonus
    const bonusStat = CATEGORY_BONUS_STAT[task.category];
    const statAmount = Math.round(QUEST_CONSTANTS.STAT_BONUS_BASE * QUEST_CONSTANTS.STAT_BONUS_RATE);
    const bonusStatGains: StatGain[] = [{ stat: bonusStat, amount: statAmount }];
    character.stats[bonusStat] += statAmount;

    // 7. Loot
    const lootDropped = rollTaskLoot(
      character,
      assessment.lootChanceBonus + luckLootBonus(characterIn),
      ctx.rng,
      now
    );
    if (lootDropped) {
      addLootToInventory(character, lootDropped);
    }

    const expGained = verifiedExp + classAffinityBonusExp + routine.bonusExp + coopBonusExp;
    const goldGained = base.gold + coopBonusGold;

    character.exp += expGained;
    character.gold += goldGained;
    character.tasksCompleted += 1;
    recordActivity(character, dayKey(now));

    const confirmation = this.buildConfirmation(task, character, bond ?? null, base, ctx);

    const result: TaskCompletionResult = {
      taskId: task.id,
      expGained,
      goldGained,
      progressBefore,
      progressAfter: levelProgress(character.exp, character.level),
      levelUpAvailable: canLevelUp(character.exp, character.level),
      bonusStatGains,
      verificationTier: assessment.tier,
      verificationMultiplier: assessment.multiplier,
      geofence: assessment.geofence,
      classAffinityBonusExp,
      routineBundleCompleted: routine.completed,
      routineBonusExp: routine.bonusExp,
      isCoop: task.isCoop,
      coopBonusExp,
      coopBonusGold,
      coopBondExp,
      coopPartnerCompleted: partnerTask !== undefined,
      lootDropped,
      anomalyFlags,
      pendingConfirmation: confirmation?.token,
    };

    return {
      result,
      task,
      character,
      bond: coopBondExp > 0 ? bond : undefined,
      partnerTask,
      confirmation,
    };
  }

  /**
   * Phase-one completions that can still earn an additive bonus later:
   * partner-assigned tasks (partner confirms) and physical tasks (activity data confirms).
   */
  private static buildConfirmation(
    task: ITask,
    character: ICharacter,
    bond: IBond | null,
    base: BaseReward,
    ctx: CompletionContext
  ): IPendingConfirmation | undefined {
    const bonusExp = Math.round(base.exp * QUEST_CONSTANTS.CONFIRMATION_BONUS);

    if (task.isFromPartner && bond) {
      return {
        token: uuidv4(),
        taskId: task.id,
        characterId: character.id,
        bondId: bond.id,
        kind: ConfirmationKind.PARTNER,
        expDelta: bonusExp,
        goldDelta: Math.round(base.gold * QUEST_CONSTANTS.CONFIRMATION_BONUS),
        bondExpDelta: QUEST_CONSTANTS.PARTNER_BOND_EXP,
        status: ConfirmationStatus.PENDING,
        createdAt: ctx.now,
      };
    }

    if (task.category === TaskCategory.PHYSICAL && ctx.activityConfirmationAvailable) {
      return {
        token: uuidv4(),
        taskId: task.id,
        characterId: character.id,
        kind: ConfirmationKind.ACTIVITY,
        expDelta: bonusExp,
        goldDelta: 0,
        bondExpDelta: 0,
        status: ConfirmationStatus.PENDING,
        createdAt: ctx.now,
      };
    }

    return undefined;
  }

  /**
   * A missed habit costs the level-scaled base reward, floored at zero.
   * No bonus rules run.
   */
  static failHabit(taskIn: ITask, characterIn: ICharacter, now: Date): HabitPenalty {
    const task = structuredClone(taskIn);
    const character = structuredClone(characterIn);

    TaskLifecycle.fail(task, now);

    const base = this.baseReward(task, character.level);
    const expLost = Math.min(character.exp, base.exp);
    const goldLost = Math.min(character.gold, base.gold);
    character.exp -= expLost;
    character.gold -= goldLost;

    return { task, character, expLost, goldLost };
  }

  /**
   * Phase two: apply a confirmation's delta exactly once. Rejected or
   * late confirmations are marked discarded and grant nothing.
   */
  static resolveConfirmation(
    confirmationIn: IPendingConfirmation,
    characterIn: ICharacter,
    bondIn: IBond | null,
    confirmed: boolean,
    taskFailedSinceIssue: boolean,
    now: Date
  ): { outcome: ConfirmationOutcome; confirmation: IPendingConfirmation; character: ICharacter; bond?: IBond } {
    const confirmation = structuredClone(confirmationIn);
    const character = structuredClone(characterIn);
    const bond = bondIn ? structuredClone(bondIn) : undefined;

    if (confirmation.status !== ConfirmationStatus.PENDING) {
      return {
        outcome: {
          token: confirmation.token,
          status: confirmation.status,
          expApplied: 0,
          goldApplied: 0,
          bondExpApplied: 0,
          levelUpAvailable: canLevelUp(character.exp, character.level),
        },
        confirmation,
        character,
      };
    }

    confirmation.resolvedAt = now;

    if (!confirmed || taskFailedSinceIssue) {
      confirmation.status = ConfirmationStatus.DISCARDED;
      return {
        outcome: {
          token: confirmation.token,
          status: confirmation.status,
          expApplied: 0,
          goldApplied: 0,
          bondExpApplied: 0,
          levelUpAvailable: canLevelUp(character.exp, character.level),
        },
        confirmation,
        character,
      };
    }

    confirmation.status = ConfirmationStatus.APPLIED;
    character.exp += confirmation.expDelta;
    character.gold += confirmation.goldDelta;

    let bondExpApplied = 0;
    if (bond && confirmation.bondExpDelta > 0) {
      gainBondExp(bond, confirmation.bondExpDelta, now);
      bondExpApplied = confirmation.bondExpDelta;
    }

    return {
      outcome: {
        token: confirmation.token,
        status: confirmation.status,
        expApplied: confirmation.expDelta,
        goldApplied: confirmation.goldDelta,
        bondExpApplied,
        levelUpAvailable: canLevelUp(character.exp, character.level),
      },
      confirmation,
      character,
      bond: bondExpApplied > 0 ? bond : undefined,
    };
  }
}

export default RewardEngine;
