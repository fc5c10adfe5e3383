import { MemoryGameStore } from '../src/repositories/memory-store';
import { QuestEngine, QuestEngineDeps } from '../src/modules/quests/quests.service';
import {
  CharacterClass,
  Clock,
  CompletionMode,
  GameNotification,
  ICharacter,
  ITask,
  NotificationSink,
  RandomSource,
  TaskCategory,
  TaskStatus,
  VerificationType,
} from '../src/types';

export const T0 = new Date('2025-03-10T12:00:00.000Z');

/**
 * A clock tests move by hand.
 */
export class FixedClock implements Clock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  advanceSeconds(seconds: number): void {
    this.advance(seconds * 1000);
  }
}

/**
 * Returns the scripted values in order, then `fallback` forever.
 */
export function scriptedRng(values: number[], fallback = 0.99): RandomSource {
  const queue = [...values];
  return () => {
    const next = queue.shift();
    return next === undefined ? fallback : next;
  };
}

export class RecordingSink implements NotificationSink {
  readonly sent: GameNotification[] = [];

  async notify(notification: GameNotification): Promise<void> {
    this.sent.push(notification);
  }
}

export interface TestEngine {
  engine: QuestEngine;
  store: MemoryGameStore;
  clock: FixedClock;
  sink: RecordingSink;
}

export function createTestEngine(overrides: Partial<QuestEngineDeps> = {}): TestEngine {
  const store = new MemoryGameStore();
  const clock = new FixedClock();
  const sink = new RecordingSink();
  const engine = new QuestEngine({
    store,
    clock,
    rng: scriptedRng([]),
    notifications: sink,
    purgeExpired: false,
    ...overrides,
  });
  return { engine, store, clock, sink };
}

export function makeCharacter(overrides: Partial<ICharacter> = {}): ICharacter {
  return {
    id: 'char-1',
    name: 'Tester',
    characterClass: null,
    level: 1,
    exp: 0,
    gold: 0,
    unspentStatPoints: 0,
    stats: { strength: 5, wisdom: 5, charisma: 5, dexterity: 5, luck: 5, defense: 5 },
    streak: { current: 0, longest: 0 },
    tasksCompleted: 0,
    onboardingComplete: true,
    dutyClaimsCount: 0,
    dutyShuffleCount: 0,
    inventory: { consumables: {}, materials: [], equipment: [] },
    createdAt: T0,
    ...overrides,
  };
}

export function makeTask(overrides: Partial<ITask> = {}): ITask {
  return {
    id: 'task-1',
    ownerId: 'char-1',
    title: 'Go for a Run',
    description: '',
    category: TaskCategory.PHYSICAL,
    verificationType: VerificationType.NONE,
    status: TaskStatus.IN_PROGRESS,
    completionMode: CompletionMode.STANDARD,
    createdAt: T0,
    startedAt: T0,
    proof: {},
    isOnDutyBoard: false,
    isDailyDuty: false,
    isHabit: false,
    isRecurring: false,
    isFromPartner: false,
    isSharedWithPartner: false,
    isCoop: false,
    habitStreak: 0,
    habitLongestStreak: 0,
    coopBonusAwarded: false,
    partnerConfirmed: false,
    ...overrides,
  };
}

export const testUtils = {
  createTestEngine,
  makeCharacter,
  makeTask,
  scriptedRng,
  classes: CharacterClass,
};
