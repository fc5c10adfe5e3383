import { z } from 'zod';
import rawTemplates from '@/data/duty-templates.json';
import { DUTY_CONSTANTS, QUEST_CONSTANTS } from '@/config';
import { typedLogger } from '@/lib/typed-logger';
import { GameStore, UnitOfWork } from '@/repositories/game-store';
import {
  Clock,
  CompletionMode,
  IBond,
  ICharacter,
  ITask,
  MiniGameKind,
  TaskCategory,
  TaskStatus,
  VerificationType,
} from '@/types';
import { dayKey } from '@/utils/day-key';
import { SeededRandom, hashSeed } from '@/utils/seeded-random';
import { buildTask } from './task-factory';
import { TaskLifecycle } from './task-lifecycle';

const dutyTemplateSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  category: z.nativeEnum(TaskCategory),
  verificationType: z.nativeEnum(VerificationType).optional(),
  completionMode: z.nativeEnum(CompletionMode).optional(),
  miniGameKind: z.nativeEnum(MiniGameKind).optional(),
});

export type DutyTemplate = z.infer<typeof dutyTemplateSchema>;

export const DUTY_TEMPLATES: readonly DutyTemplate[] = z.array(dutyTemplateSchema).parse(rawTemplates);

const CATEGORY_ORDER: readonly TaskCategory[] = Object.values(TaskCategory);

export const BONUS_TITLE_PREFIX = 'Bonus: ';

export interface TemplateExclusions {
  titles?: ReadonlySet<string>;
  categories?: ReadonlySet<TaskCategory>;
}

function templatesByCategory(templates: readonly DutyTemplate[]): Map<TaskCategory, DutyTemplate[]> {
  const pools = new Map<TaskCategory, DutyTemplate[]>();
  for (const category of CATEGORY_ORDER) {
    pools.set(category, templates.filter((t) => t.category === category));
  }
  return pools;
}

export function dutySeed(seedKey: string, day: string, offset: number): number {
  return hashSeed(`${seedKey}:${day}:${offset * QUEST_CONSTANTS.SHUFFLE_SEED_PRIME}`);
}

function sameDay(stamp: string | undefined, count: number, today: string): number {
  return stamp === today ? count : 0;
}

/**
 * Daily duty board: a seeded set of templates from distinct categories,
 * regenerated lazily per local day and shared between bonded partners.
 */
export class DutyBoardService {
  constructor(
    private readonly store: GameStore,
    private readonly clock: Clock
  ) {}

  /**
   * Pick up to `count` templates from distinct categories. The category
   * order and every pool are shuffled up front, so the result depends only
   * on the seed inputs and the exclusions.
   */
  static selectTemplates(
    seedKey: string,
    day: string,
    offset: number,
    count: number,
    exclusions: TemplateExclusions = {},
    templates: readonly DutyTemplate[] = DUTY_TEMPLATES
  ): DutyTemplate[] {
    const rng = new SeededRandom(dutySeed(seedKey, day, offset));
    const pools = templatesByCategory(templates);
    const categories = rng.shuffle(CATEGORY_ORDER);
    const shuffledPools = categories.map((category) => ({
      category,
      pool: rng.shuffle(pools.get(category) ?? []),
    }));

    const picked: DutyTemplate[] = [];
    for (const { category, pool } of shuffledPools) {
      if (picked.length >= count) break;
      if (exclusions.categories?.has(category)) continue;
      const template = pool.find((t) => !exclusions.titles?.has(t.title));
      if (template) {
        picked.push(template);
      }
    }
    return picked;
  }

  static seedKeyFor(character: ICharacter, bond: IBond | null): string {
    return bond ? bond.id : character.id;
  }

  private async loadCharacter(characterId: string): Promise<ICharacter> {
    const character = await this.store.getCharacter(characterId);
    if (!character) {
      throw new Error('CHARACTER_NOT_FOUND');
    }
    return character;
  }

  private buildDuty(ownerId: string, template: DutyTemplate, today: string, bonus: boolean): ITask {
    return buildTask(
      {
        ownerId,
        title: bonus ? `${BONUS_TITLE_PREFIX}${template.title}` : template.title,
        description: template.description,
        category: template.category,
        verificationType: template.verificationType,
        completionMode: template.completionMode,
        miniGameKind: template.miniGameKind,
        isOnDutyBoard: true,
        isDailyDuty: true,
        dutyDay: today,
        isBonusDuty: bonus,
      },
      this.clock.now()
    );
  }

  /**
   * Claimed duties of today survive; pending ones and anything left over from
   * earlier days are replaced with the board for `offset`.
   */
  private planBoard(character: ICharacter, bond: IBond | null, duties: ITask[], today: string, offset: number) {
    const regular = duties.filter((d) => !d.isBonusDuty);
    const claimed = regular.filter((d) => d.dutyDay === today && d.status !== TaskStatus.PENDING);
    const stale = duties.filter(
      (d) => d.status === TaskStatus.PENDING && (d.dutyDay !== today || !d.isBonusDuty)
    );

    const templates = DutyBoardService.selectTemplates(
      DutyBoardService.seedKeyFor(character, bond),
      today,
      offset,
      Math.max(0, DUTY_CONSTANTS.DAILY_DUTY_COUNT - claimed.length),
      {
        titles: new Set(claimed.map((d) => d.title)),
        categories: new Set(claimed.map((d) => d.category)),
      }
    );
    const fresh = templates.map((t) => this.buildDuty(character.id, t, today, false));

    return { claimed, fresh, deleteTaskIds: stale.map((d) => d.id) };
  }

  async ensureTodaysDuties(characterId: string): Promise<ITask[]> {
    const character = await this.loadCharacter(characterId);
    const now = this.clock.now();
    const today = dayKey(now);

    const duties = await this.store.findTasks({ ownerId: characterId, isDailyDuty: true });
    const todays = duties.filter((d) => d.dutyDay === today);
    const todaysRegular = todays.filter((d) => !d.isBonusDuty);

    if (todaysRegular.length === DUTY_CONSTANTS.DAILY_DUTY_COUNT) {
      const staleIds = duties
        .filter((d) => d.dutyDay !== today && d.status === TaskStatus.PENDING)
        .map((d) => d.id);
      if (staleIds.length > 0) {
        await this.store.commit({ deleteTaskIds: staleIds });
      }
      return todays;
    }

    const bond = await this.store.findBondByMember(characterId);
    const offset = sameDay(character.dutyShuffleDay, character.dutyShuffleCount, today);
    const plan = this.planBoard(character, bond, duties, today, offset);

    await this.store.commit({ tasks: plan.fresh, deleteTaskIds: plan.deleteTaskIds });

    typedLogger.info('Duty board generated', {
      characterId,
      day: today,
      offset,
      kept: plan.claimed.length,
      generated: plan.fresh.length,
      removed: plan.deleteTaskIds.length,
    });

    const bonus = todays.filter((d) => d.isBonusDuty);
    return [...plan.claimed, ...plan.fresh, ...bonus];
  }

  /**
   * One shuffle per local day. The pending duties are replaced with the
   * board for the next seed offset.
   */
  async refreshDutyBoard(characterId: string): Promise<ITask[]> {
    const character = await this.loadCharacter(characterId);
    const now = this.clock.now();
    const today = dayKey(now);

    const used = sameDay(character.dutyShuffleDay, character.dutyShuffleCount, today);
    if (used >= QUEST_CONSTANTS.FREE_SHUFFLES_PER_DAY) {
      throw new Error('SHUFFLE_ALREADY_USED');
    }

    const bond = await this.store.findBondByMember(characterId);
    const duties = await this.store.findTasks({ ownerId: characterId, isDailyDuty: true });
    const offset = used + 1;
    const plan = this.planBoard(character, bond, duties, today, offset);

    character.dutyShuffleDay = today;
    character.dutyShuffleCount = offset;

    await this.store.commit({
      tasks: plan.fresh,
      characters: [character],
      deleteTaskIds: plan.deleteTaskIds,
    });

    typedLogger.info('Duty board shuffled', { characterId, day: today, offset });

    const bonus = duties.filter((d) => d.dutyDay === today && d.isBonusDuty);
    return [...plan.claimed, ...plan.fresh, ...bonus];
  }

  /**
   * Take a duty off the board and start it. Regular duties count against
   * the daily claim limit; a rejected claim changes nothing.
   */
  async claimDuty(characterId: string, taskId: string): Promise<ITask> {
    const character = await this.loadCharacter(characterId);
    const task = await this.store.getTask(taskId);
    if (!task || task.ownerId !== characterId) {
      throw new Error('TASK_NOT_FOUND');
    }
    if (!task.isDailyDuty) {
      throw new Error('NOT_A_DUTY');
    }

    const now = this.clock.now();
    const today = dayKey(now);
    if (!task.isOnDutyBoard || task.status !== TaskStatus.PENDING || task.dutyDay !== today) {
      throw new Error('DUTY_NOT_AVAILABLE');
    }

    const claims = sameDay(character.dutyClaimsDay, character.dutyClaimsCount, today);
    if (!task.isBonusDuty && claims >= DUTY_CONSTANTS.MAX_CLAIMS_PER_DAY) {
      typedLogger.debug('Duty claim rejected', { characterId, taskId, claims });
      throw new Error('DAILY_CLAIM_LIMIT');
    }

    TaskLifecycle.start(task, now);
    task.isOnDutyBoard = false;

    const unit: UnitOfWork = { tasks: [task] };
    if (!task.isBonusDuty) {
      character.dutyClaimsDay = today;
      character.dutyClaimsCount = claims + 1;
      unit.characters = [character];
    }
    await this.store.commit(unit);

    typedLogger.info('Duty claimed', { characterId, taskId, bonus: task.isBonusDuty === true });
    return task;
  }

  /**
   * Once the day's claim allowance is used up and every claimed duty is
   * done, one extra duty from a category not on today's board is offered.
   */
  async generateBonusDuty(characterId: string): Promise<ITask> {
    const character = await this.loadCharacter(characterId);
    const now = this.clock.now();
    const today = dayKey(now);

    const duties = await this.store.findTasks({ ownerId: characterId, isDailyDuty: true, dutyDay: today });
    const existing = duties.find((d) => d.isBonusDuty);
    if (existing) {
      return existing;
    }

    const claims = sameDay(character.dutyClaimsDay, character.dutyClaimsCount, today);
    const claimed = duties.filter((d) => d.status !== TaskStatus.PENDING);
    const allDone = claimed.length > 0 && claimed.every((d) => d.status === TaskStatus.COMPLETED);
    if (claims < DUTY_CONSTANTS.MAX_CLAIMS_PER_DAY || !allDone) {
      throw new Error('BONUS_DUTY_LOCKED');
    }

    const bond = await this.store.findBondByMember(characterId);
    const usedCategories = new Set(duties.map((d) => d.category));
    const exclusions: TemplateExclusions = {
      titles: new Set(duties.map((d) => d.title)),
      categories: usedCategories.size < CATEGORY_ORDER.length ? usedCategories : undefined,
    };
    const [template] = DutyBoardService.selectTemplates(
      `${DutyBoardService.seedKeyFor(character, bond)}:bonus`,
      today,
      0,
      1,
      exclusions
    );
    if (!template) {
      throw new Error('BONUS_DUTY_LOCKED');
    }

    const bonus = this.buildDuty(characterId, template, today, true);
    await this.store.commit({ tasks: [bonus] });

    typedLogger.info('Bonus duty generated', { characterId, day: today, category: bonus.category });
    return bonus;
  }
}

export default DutyBoardService;
