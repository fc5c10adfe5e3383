import { v4 as uuidv4 } from 'uuid';
import { QUEST_CONSTANTS, config } from '@/config';
import { logGame, logPerformance, logSecurity } from '@/lib/logger';
import { typedLogger } from '@/lib/typed-logger';
import { GameStore } from '@/repositories/game-store';
import { canLevelUp } from '@/services/reward-curve';
import { DutyBoardService } from '@/services/duty-board';
import { detectMotion } from '@/services/motion';
import { LoggingNotificationSink, safeNotify } from '@/services/notification';
import { RewardEngine } from '@/services/reward-engine';
import { isValidRoutineSize } from '@/services/routine';
import { NewTaskInput, buildTask } from '@/services/task-factory';
import { TaskLifecycle, isTerminal } from '@/services/task-lifecycle';
import { VerificationEngine } from '@/services/verification';
import { expireStreakIfMissed } from '@/services/streak';
import {
  ActivityConfirmationSource,
  CharacterClass,
  Clock,
  CompletionCheck,
  CompletionOutcome,
  ConfirmationKind,
  ConfirmationOutcome,
  ConfirmationStatus,
  Coordinates,
  GeofenceResult,
  IBond,
  ICharacter,
  IRoutineBundle,
  ITask,
  LocationSource,
  MotionSampleSource,
  NotificationKind,
  NotificationSink,
  RandomSource,
  RejectionCode,
  RoutineTimeOfDay,
  StatType,
  TaskCategory,
  TaskStatus,
} from '@/types';
import { dayKey } from '@/utils/day-key';
import { validateCoordinates } from '@/utils/geo';
import { KeyedMutex } from '@/utils/keyed-mutex';

export const systemClock: Clock = { now: () => new Date() };

export interface QuestEngineDeps {
  store: GameStore;
  clock?: Clock;
  rng?: RandomSource;
  notifications?: NotificationSink;
  activity?: ActivityConfirmationSource;
  motion?: MotionSampleSource;
  location?: LocationSource;
  purgeExpired?: boolean;
}

export interface NewCharacterInput {
  name: string;
  characterClass?: CharacterClass | null;
}

export interface PhotoCaptureInput {
  byteLength: number;
  capturedAt?: Date;
  motionSamples?: number[];
}

export interface NewRoutineInput {
  name: string;
  description?: string;
  timeOfDay?: RoutineTimeOfDay;
  habitIds: string[];
}

export interface HabitFailure {
  taskId: string;
  characterId: string;
  expLost: number;
  goldLost: number;
}

export interface SweepResult {
  expired: number;
  purged: number;
}

const STARTING_STAT = 5;
const DAY_MS = 24 * 60 * 60 * 1000;
const OPEN_STATUSES = [TaskStatus.PENDING, TaskStatus.IN_PROGRESS];

function ownersOf(tasks: ITask[]): string[] {
  return [...new Set(tasks.map((task) => task.ownerId))];
}

function rejected(code: RejectionCode, reason: string, remainingSeconds?: number): CompletionOutcome {
  return { status: 'rejected', code, reason, remainingSeconds };
}

/**
 * Game facade: the operations the presentation layer calls. Each operation
 * reads detached copies from the store, runs the pure services over them,
 * and persists every change in a single commit.
 *
 * Operations that write a character, its tasks or its bond hold the
 * household lock (the bond when there is one, else the character) from
 * their first read to their commit.
 */
export class QuestEngine {
  private readonly duties: DutyBoardService;
  private readonly store: GameStore;
  private readonly clock: Clock;
  private readonly rng: RandomSource;
  private readonly notifications: NotificationSink;
  private readonly activity?: ActivityConfirmationSource;
  private readonly motion?: MotionSampleSource;
  private readonly location?: LocationSource;
  private readonly purgeExpired: boolean;
  private readonly inflight = new Set<Promise<void>>();
  private readonly locks = new KeyedMutex();

  constructor(deps: QuestEngineDeps) {
    this.store = deps.store;
    this.clock = deps.clock ?? systemClock;
    this.rng = deps.rng ?? Math.random;
    this.notifications = deps.notifications ?? new LoggingNotificationSink();
    this.activity = deps.activity;
    this.motion = deps.motion;
    this.location = deps.location;
    this.purgeExpired = deps.purgeExpired ?? config.PURGE_EXPIRED_TASKS;
    this.duties = new DutyBoardService(this.store, this.clock);
  }

  private async householdKey(characterId: string): Promise<string> {
    const bond = await this.store.findBondByMember(characterId);
    return bond ? `bond:${bond.id}` : `character:${characterId}`;
  }

  private async exclusive<T>(characterId: string, work: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(await this.householdKey(characterId), work);
  }

  private async exclusiveForTask<T>(taskId: string, work: () => Promise<T>): Promise<T> {
    const { ownerId } = await this.getTask(taskId);
    return this.exclusive(ownerId, work);
  }

  // Characters and bonds

  async createCharacter(input: NewCharacterInput): Promise<ICharacter> {
    const character: ICharacter = {
      id: uuidv4(),
      name: input.name,
      characterClass: input.characterClass ?? null,
      level: 1,
      exp: 0,
      gold: 0,
      unspentStatPoints: 0,
      stats: {
        [StatType.STRENGTH]: STARTING_STAT,
        [StatType.WISDOM]: STARTING_STAT,
        [StatType.CHARISMA]: STARTING_STAT,
        [StatType.DEXTERITY]: STARTING_STAT,
        [StatType.LUCK]: STARTING_STAT,
        [StatType.DEFENSE]: STARTING_STAT,
      },
      streak: { current: 0, longest: 0 },
      tasksCompleted: 0,
      onboardingComplete: false,
      dutyClaimsCount: 0,
      dutyShuffleCount: 0,
      inventory: { consumables: {}, materials: [], equipment: [] },
      createdAt: this.clock.now(),
    };
    await this.store.commit({ characters: [character] });
    logGame('character_created', character.id, { characterClass: character.characterClass });
    return character;
  }

  async getCharacter(characterId: string): Promise<ICharacter> {
    const character = await this.store.getCharacter(characterId);
    if (!character) {
      throw new Error('CHARACTER_NOT_FOUND');
    }
    return character;
  }

  async findBond(characterId: string): Promise<IBond | null> {
    return this.store.findBondByMember(characterId);
  }

  async createBond(characterId: string, partnerId: string): Promise<IBond> {
    if (characterId === partnerId) {
      throw new Error('INVALID_BOND');
    }
    await this.getCharacter(characterId);
    await this.getCharacter(partnerId);

    const [existingA, existingB] = await Promise.all([
      this.store.findBondByMember(characterId),
      this.store.findBondByMember(partnerId),
    ]);
    if (existingA || existingB) {
      throw new Error('BOND_EXISTS');
    }

    const bond: IBond = {
      id: uuidv4(),
      memberIds: [characterId, partnerId],
      bondLevel: 1,
      bondExp: 0,
      createdAt: this.clock.now(),
    };
    await this.store.commit({ bonds: [bond] });
    logGame('bond_created', characterId, { bondId: bond.id, partnerId });
    return bond;
  }

  /**
   * Apply every queued level-up. Each level grants unspent stat points.
   */
  async applyLevelUp(characterId: string): Promise<{ character: ICharacter; levelsGained: number }> {
    return this.exclusive(characterId, async () => {
      const character = await this.getCharacter(characterId);
      if (!canLevelUp(character.exp, character.level)) {
        throw new Error('NO_LEVEL_UP_AVAILABLE');
      }

      let levelsGained = 0;
      while (canLevelUp(character.exp, character.level)) {
        character.level += 1;
        character.unspentStatPoints += QUEST_CONSTANTS.STAT_POINTS_PER_LEVEL;
        levelsGained += 1;
      }
      await this.store.commit({ characters: [character] });
      logGame('level_up', characterId, { level: character.level, levelsGained });
      return { character, levelsGained };
    });
  }

  // Tasks

  async createTask(input: NewTaskInput): Promise<ITask> {
    await this.getCharacter(input.ownerId);
    if (input.habitDueTime !== undefined && !/^([01]\d|2[0-3]):([0-5]\d)$/.test(input.habitDueTime)) {
      throw new Error('INVALID_DUE_TIME');
    }
    if (input.geofence && !validateCoordinates(input.geofence)) {
      throw new Error('INVALID_COORDINATES');
    }

    const now = this.clock.now();
    if (!input.isCoop) {
      const task = buildTask(input, now);
      await this.store.commit({ tasks: [task] });
      return task;
    }

    // Co-op tasks exist as one mirrored instance per bond member.
    const bond = await this.store.findBondByMember(input.ownerId);
    if (!bond) {
      throw new Error('BOND_REQUIRED');
    }
    const partnerId = bond.memberIds.find((id) => id !== input.ownerId) ?? input.ownerId;
    const coopPairId = uuidv4();
    const task = buildTask({ ...input, coopPairId }, now);
    const mirror = buildTask({ ...input, ownerId: partnerId, coopPairId, isSharedWithPartner: true }, now);
    await this.store.commit({ tasks: [task, mirror] });
    logGame('coop_task_created', input.ownerId, { coopPairId, partnerId });
    return task;
  }

  async getTask(taskId: string): Promise<ITask> {
    const task = await this.store.getTask(taskId);
    if (!task) {
      throw new Error('TASK_NOT_FOUND');
    }
    return task;
  }

  async listTasks(ownerId: string, status?: TaskStatus): Promise<ITask[]> {
    return this.store.findTasks({ ownerId, status });
  }

  async deleteTask(taskId: string): Promise<void> {
    await this.exclusiveForTask(taskId, async () => {
      await this.getTask(taskId);
      await this.store.commit({ deleteTaskIds: [taskId] });
    });
  }

  /**
   * Start a task the owner created. Duty board items only become active
   * through `claimDuty`, which enforces the daily claim limit.
   */
  async startTask(taskId: string, minimumDurationSeconds?: number): Promise<ITask> {
    return this.exclusiveForTask(taskId, async () => {
      const task = await this.getTask(taskId);
      if (task.isDailyDuty) {
        throw new Error('DUTY_NOT_CLAIMED');
      }
      TaskLifecycle.start(task, this.clock.now(), minimumDurationSeconds);
      await this.store.commit({ tasks: [task] });
      return task;
    });
  }

  async canComplete(taskId: string): Promise<CompletionCheck> {
    const task = await this.getTask(taskId);
    return VerificationEngine.canComplete(task, this.clock.now());
  }

  private async getTaskForProof(taskId: string): Promise<ITask> {
    const task = await this.getTask(taskId);
    if (task.status === TaskStatus.PENDING) {
      throw new Error('TASK_NOT_STARTED');
    }
    if (isTerminal(task.status)) {
      throw new Error('INVALID_TRANSITION');
    }
    return task;
  }

  /**
   * Attach a photo to an in-progress task. Motion samples come from the
   * request or the configured sensor source; too few samples means no motion.
   */
  async capturePhoto(taskId: string, input: PhotoCaptureInput): Promise<{ task: ITask; photoValid: boolean }> {
    if (!Number.isInteger(input.byteLength) || input.byteLength <= 0) {
      throw new Error('PHOTO_EMPTY');
    }
    return this.exclusiveForTask(taskId, async () => {
      const task = await this.getTaskForProof(taskId);
      const now = this.clock.now();
      const capturedAt = input.capturedAt ?? now;
      const samples = input.motionSamples ?? this.motion?.samples() ?? [];

      task.proof.photo = {
        byteLength: input.byteLength,
        capturedAt,
        motionDetected: detectMotion(samples),
      };
      await this.store.commit({ tasks: [task] });
      return { task, photoValid: VerificationEngine.isPhotoTimestampValid(capturedAt, now) };
    });
  }

  /**
   * Record the completion location. Without explicit coordinates the
   * location source is asked for the current position.
   */
  async captureLocation(
    taskId: string,
    coordinates?: Coordinates
  ): Promise<{ task: ITask; geofence?: GeofenceResult }> {
    await this.getTaskForProof(taskId);
    const location = coordinates ?? (this.location ? await this.location.currentLocation() : null);
    if (!location) {
      throw new Error('LOCATION_UNAVAILABLE');
    }
    if (!validateCoordinates(location)) {
      throw new Error('INVALID_COORDINATES');
    }

    return this.exclusiveForTask(taskId, async () => {
      const task = await this.getTaskForProof(taskId);
      task.proof.location = { lat: location.lat, lng: location.lng };
      await this.store.commit({ tasks: [task] });
      return { task, geofence: task.geofence ? VerificationEngine.verifyTaskGeofence(task) : undefined };
    });
  }

  async completeTask(taskId: string): Promise<CompletionOutcome> {
    return this.exclusiveForTask(taskId, () => this.completeLocked(taskId));
  }

  private async completeLocked(taskId: string): Promise<CompletionOutcome> {
    const startTime = Date.now();
    const task = await this.getTask(taskId);
    const now = this.clock.now();

    if (task.status === TaskStatus.COMPLETED) {
      return rejected('ALREADY_COMPLETED', 'This task is already completed.');
    }
    if (task.status === TaskStatus.PENDING) {
      return rejected('TASK_NOT_STARTED', 'Start the task before completing it.');
    }
    if (isTerminal(task.status)) {
      throw new Error('INVALID_TRANSITION');
    }

    const character = await this.store.getCharacter(task.ownerId);
    if (!character) {
      typedLogger.warn('Completion skipped: no character', { taskId, ownerId: task.ownerId });
      return rejected('CHARACTER_REQUIRED', 'No character is linked to this task.');
    }

    const bond = await this.store.findBondByMember(character.id);
    if (task.isCoop && !bond) {
      typedLogger.warn('Completion skipped: co-op task without bond', { taskId, characterId: character.id });
      return rejected('BOND_REQUIRED', 'Co-op tasks need an active bond.');
    }

    const check = VerificationEngine.canComplete(task, now);
    if (!check.allowed) {
      return rejected(
        check.code ?? 'MIN_DURATION_NOT_MET',
        check.reason ?? 'This task cannot be completed yet.',
        check.remainingSeconds > 0 ? check.remainingSeconds : undefined
      );
    }

    const partnerTask =
      task.isCoop && task.coopPairId
        ? (await this.store.findTasks({ coopPairId: task.coopPairId })).find((t) => t.id !== task.id) ?? null
        : null;
    const routineBundles = task.isHabit ? await this.store.findRoutineBundles(character.id) : [];
    const habits = task.isHabit ? await this.store.findTasks({ ownerId: character.id, isHabit: true }) : [];
    const recentCompletions = (
      await this.store.findTasks({ ownerId: character.id, completedSince: new Date(now.getTime() - DAY_MS) })
    ).flatMap((t) => (t.completedAt ? [t.completedAt] : []));

    const effects = RewardEngine.complete(task, character, {
      now,
      rng: this.rng,
      bond,
      partnerTask,
      routineBundles,
      habits,
      recentCompletions,
      activityConfirmationAvailable: task.category === TaskCategory.PHYSICAL && this.activity !== undefined,
    });

    await this.store.commit({
      tasks: effects.partnerTask ? [effects.task, effects.partnerTask] : [effects.task],
      characters: [effects.character],
      bonds: effects.bond ? [effects.bond] : undefined,
      confirmations: effects.confirmation ? [effects.confirmation] : undefined,
    });

    const { result } = effects;
    logGame('task_completed', character.id, {
      taskId,
      expGained: result.expGained,
      goldGained: result.goldGained,
      tier: result.verificationTier,
      coopBonus: result.coopBonusExp > 0,
    });
    if (result.anomalyFlags.length > 0) {
      logSecurity('completion_anomaly', 'low', { characterId: character.id, taskId, flags: result.anomalyFlags });
    }
    logPerformance('complete_task', Date.now() - startTime, { taskId });

    await safeNotify(this.notifications, {
      kind: NotificationKind.TASK_COMPLETED,
      characterId: character.id,
      title: 'Quest complete!',
      message: `+${result.expGained} EXP, +${result.goldGained} gold`,
      data: { taskId },
    });
    if (result.levelUpAvailable) {
      await safeNotify(this.notifications, {
        kind: NotificationKind.LEVEL_UP_READY,
        characterId: character.id,
        title: 'Level up available',
        message: `You have enough EXP to reach level ${character.level + 1}.`,
      });
    }

    if (effects.confirmation?.kind === ConfirmationKind.ACTIVITY) {
      this.track(this.runActivityConfirmation(effects.confirmation.token, effects.task));
    }

    return { status: 'completed', result };
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((error: unknown) => {
        typedLogger.warn('Background confirmation failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }

  private async runActivityConfirmation(token: string, task: ITask): Promise<void> {
    if (!this.activity) return;
    const confirmed = await this.activity.confirm(task);
    await this.applyConfirmation(token, confirmed);
  }

  /**
   * Wait for background confirmations started by completions.
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /**
   * Phase two of a completion. The delta is applied at most once; a token
   * whose task has since failed or disappeared is discarded.
   */
  async applyConfirmation(token: string, confirmed: boolean): Promise<ConfirmationOutcome> {
    const issued = await this.store.getConfirmation(token);
    if (!issued) {
      throw new Error('CONFIRMATION_NOT_FOUND');
    }
    return this.exclusive(issued.characterId, () => this.resolveLocked(token, confirmed));
  }

  private async resolveLocked(token: string, confirmed: boolean): Promise<ConfirmationOutcome> {
    const confirmation = await this.store.getConfirmation(token);
    if (!confirmation) {
      throw new Error('CONFIRMATION_NOT_FOUND');
    }
    const character = await this.getCharacter(confirmation.characterId);
    const bond = confirmation.bondId ? await this.store.getBond(confirmation.bondId) : null;
    const task = await this.store.getTask(confirmation.taskId);
    const issuedDay = dayKey(confirmation.createdAt);
    const invalidated =
      task === null ||
      task.status === TaskStatus.FAILED ||
      (task.habitFailedOn !== undefined && task.habitFailedOn >= issuedDay);

    const resolution = RewardEngine.resolveConfirmation(
      confirmation,
      character,
      bond,
      confirmed,
      invalidated,
      this.clock.now()
    );

    if (confirmation.status !== ConfirmationStatus.PENDING) {
      return resolution.outcome;
    }

    const tasks: ITask[] = [];
    if (task && resolution.outcome.status === ConfirmationStatus.APPLIED && confirmation.kind === ConfirmationKind.PARTNER) {
      task.partnerConfirmed = true;
      tasks.push(task);
    }

    await this.store.commit({
      tasks,
      confirmations: [resolution.confirmation],
      characters: [resolution.character],
      bonds: resolution.bond ? [resolution.bond] : undefined,
    });

    logGame('confirmation_resolved', character.id, {
      token,
      kind: confirmation.kind,
      status: resolution.outcome.status,
    });

    if (resolution.outcome.status === ConfirmationStatus.APPLIED) {
      await safeNotify(this.notifications, {
        kind: NotificationKind.CONFIRMATION_APPLIED,
        characterId: character.id,
        title: confirmation.kind === ConfirmationKind.PARTNER ? 'Partner confirmed' : 'Activity confirmed',
        message: `+${resolution.outcome.expApplied} bonus EXP`,
        data: { taskId: confirmation.taskId },
      });
    }
    return resolution.outcome;
  }

  // Routines

  async createRoutineBundle(ownerId: string, input: NewRoutineInput): Promise<IRoutineBundle> {
    await this.getCharacter(ownerId);
    if (!isValidRoutineSize(input.habitIds)) {
      throw new Error('INVALID_ROUTINE_SIZE');
    }
    const habits = await this.store.findTasks({ ownerId, isHabit: true });
    const known = new Set(habits.map((h) => h.id));
    if (!input.habitIds.every((id) => known.has(id))) {
      throw new Error('TASK_NOT_FOUND');
    }

    const bundle: IRoutineBundle = {
      id: uuidv4(),
      ownerId,
      name: input.name,
      description: input.description,
      timeOfDay: input.timeOfDay ?? RoutineTimeOfDay.ANYTIME,
      habitIds: [...input.habitIds],
      isArchived: false,
      createdAt: this.clock.now(),
    };
    await this.store.commit({ routines: [bundle] });
    return bundle;
  }

  // Verification helpers

  verifyGeofence(
    targetLat: number,
    targetLng: number,
    targetRadius: number,
    userLat: number,
    userLng: number
  ): GeofenceResult {
    return VerificationEngine.verifyGeofence(targetLat, targetLng, targetRadius, userLat, userLng);
  }

  isPhotoTimestampValid(capturedAt: Date): boolean {
    return VerificationEngine.isPhotoTimestampValid(capturedAt, this.clock.now());
  }

  // Duty board

  ensureTodaysDuties(characterId: string): Promise<ITask[]> {
    return this.exclusive(characterId, () => this.duties.ensureTodaysDuties(characterId));
  }

  refreshDutyBoard(characterId: string): Promise<ITask[]> {
    return this.exclusive(characterId, () => this.duties.refreshDutyBoard(characterId));
  }

  claimDuty(characterId: string, taskId: string): Promise<ITask> {
    return this.exclusive(characterId, () => this.duties.claimDuty(characterId, taskId));
  }

  generateBonusDuty(characterId: string): Promise<ITask> {
    return this.exclusive(characterId, () => this.duties.generateBonusDuty(characterId));
  }

  // Scheduled maintenance

  /**
   * Fail every open habit whose due time has passed today and charge the
   * penalty. Each habit commits on its own, under its owner's lock.
   */
  async checkHabitDeadlines(): Promise<HabitFailure[]> {
    const now = this.clock.now();
    const open = await this.store.findTasks({ isHabit: true, status: OPEN_STATUSES });
    const failures: HabitFailure[] = [];

    for (const candidate of open) {
      if (!TaskLifecycle.isHabitPastDue(candidate, now)) continue;
      const failure = await this.exclusive(candidate.ownerId, () => this.failHabitLocked(candidate.id, now));
      if (failure) {
        failures.push(failure);
      }
    }
    return failures;
  }

  private async failHabitLocked(taskId: string, now: Date): Promise<HabitFailure | null> {
    const habit = await this.store.getTask(taskId);
    if (!habit || !TaskLifecycle.isHabitPastDue(habit, now)) {
      return null;
    }

    const character = await this.store.getCharacter(habit.ownerId);
    if (!character) {
      typedLogger.warn('Habit deadline skipped: no character', { taskId: habit.id, ownerId: habit.ownerId });
      return null;
    }

    const penalty = RewardEngine.failHabit(habit, character, now);
    await this.store.commit({ tasks: [penalty.task], characters: [penalty.character] });

    logGame('habit_failed', character.id, { taskId: habit.id, expLost: penalty.expLost, goldLost: penalty.goldLost });
    await safeNotify(this.notifications, {
      kind: NotificationKind.HABIT_FAILED,
      characterId: character.id,
      title: 'Habit missed',
      message: `"${habit.title}" was missed: -${penalty.expLost} EXP, -${penalty.goldLost} gold`,
      data: { taskId: habit.id },
    });
    return { taskId: habit.id, characterId: character.id, expLost: penalty.expLost, goldLost: penalty.goldLost };
  }

  /**
   * Reopen recurring tasks and habits whose last outcome belongs to an
   * earlier day, and close out streaks that missed yesterday.
   */
  async resetRecurringHabits(): Promise<number> {
    const now = this.clock.now();
    const candidates = await this.store.findTasks({ status: [TaskStatus.COMPLETED, TaskStatus.FAILED] });
    const owners = ownersOf(candidates.filter((task) => TaskLifecycle.needsDailyReset(task, now)));

    let count = 0;
    for (const ownerId of owners) {
      count += await this.exclusive(ownerId, () => this.resetOwnerLocked(ownerId, now));
    }
    if (count > 0) {
      typedLogger.info('Recurring tasks reset', { count });
    }
    return count;
  }

  private async resetOwnerLocked(ownerId: string, now: Date): Promise<number> {
    const reset = (await this.store.findTasks({ ownerId, status: [TaskStatus.COMPLETED, TaskStatus.FAILED] }))
      .filter((task) => TaskLifecycle.needsDailyReset(task, now))
      .map((task) => TaskLifecycle.resetForNewDay(task));
    if (reset.length === 0) {
      return 0;
    }

    const character = await this.store.getCharacter(ownerId);
    const characters = character && expireStreakIfMissed(character, dayKey(now)) ? [character] : [];
    await this.store.commit({ tasks: reset, characters });
    return reset.length;
  }

  /**
   * Expire open tasks past their due date. With purging enabled, expired
   * tasks are deleted instead of kept.
   */
  async sweepExpiredTasks(): Promise<SweepResult> {
    const now = this.clock.now();
    const overdue = await this.store.findTasks({ status: OPEN_STATUSES, dueBefore: now });

    let expired = 0;
    for (const ownerId of ownersOf(overdue)) {
      expired += await this.exclusive(ownerId, () => this.expireOwnerLocked(ownerId, now));
    }

    if (this.purgeExpired) {
      const ids = (await this.store.findTasks({ status: TaskStatus.EXPIRED })).map((task) => task.id);
      if (ids.length > 0) {
        await this.store.commit({ deleteTaskIds: ids });
      }
      return { expired, purged: ids.length };
    }

    if (expired > 0) {
      typedLogger.info('Expired overdue tasks', { count: expired });
    }
    return { expired, purged: 0 };
  }

  private async expireOwnerLocked(ownerId: string, now: Date): Promise<number> {
    const overdue = await this.store.findTasks({ ownerId, status: OPEN_STATUSES, dueBefore: now });
    const expired = overdue.map((task) => TaskLifecycle.expire(task));
    if (expired.length > 0) {
      await this.store.commit({ tasks: expired });
    }
    return expired.length;
  }
}

export default QuestEngine;
