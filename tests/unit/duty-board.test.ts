import { describe, it, expect, beforeEach } from '@jest/globals';
import { BONUS_TITLE_PREFIX, DUTY_TEMPLATES, DutyBoardService } from '../../src/services/duty-board';
import { TaskCategory, TaskStatus } from '../../src/types';
import { TestEngine, createTestEngine } from '../helpers';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('Duty Board', () => {
  describe('selectTemplates', () => {
    it('should be deterministic for the same seed inputs', () => {
      const a = DutyBoardService.selectTemplates('char-1', '2025-03-10', 0, 4);
      const b = DutyBoardService.selectTemplates('char-1', '2025-03-10', 0, 4);
      expect(a).toEqual(b);
      expect(a).toHaveLength(4);
    });

    it('should pick templates from distinct categories', () => {
      const picked = DutyBoardService.selectTemplates('char-1', '2025-03-10', 1, 10);
      expect(picked).toHaveLength(Object.values(TaskCategory).length);
      expect(new Set(picked.map((t) => t.category)).size).toBe(picked.length);
    });

    it('should honour excluded categories and titles', () => {
      const excludedTitle = DUTY_TEMPLATES.filter((t) => t.category === TaskCategory.MENTAL).map((t) => t.title);
      const picked = DutyBoardService.selectTemplates('char-1', '2025-03-10', 0, 4, {
        categories: new Set([TaskCategory.PHYSICAL, TaskCategory.SOCIAL]),
        titles: new Set(excludedTitle),
      });
      expect(picked.map((t) => t.category).sort()).toEqual([
        TaskCategory.CREATIVE,
        TaskCategory.HOUSEHOLD,
        TaskCategory.WELLNESS,
      ]);
    });

    it('should cope with an empty template list', () => {
      expect(DutyBoardService.selectTemplates('char-1', '2025-03-10', 0, 4, {}, [])).toEqual([]);
    });
  });

  describe('board lifecycle', () => {
    let ctx: TestEngine;
    let characterId: string;

    beforeEach(async () => {
      ctx = createTestEngine();
      characterId = (await ctx.engine.createCharacter({ name: 'Runner' })).id;
    });

    it('should generate the day board once', async () => {
      const first = await ctx.engine.ensureTodaysDuties(characterId);
      expect(first).toHaveLength(4);
      first.forEach((duty) => {
        expect(duty.status).toBe(TaskStatus.PENDING);
        expect(duty.isOnDutyBoard).toBe(true);
        expect(duty.isDailyDuty).toBe(true);
        expect(duty.dutyDay).toBe('2025-03-10');
      });
      expect(new Set(first.map((d) => d.category)).size).toBe(4);

      const second = await ctx.engine.ensureTodaysDuties(characterId);
      expect(second.map((d) => d.id)).toEqual(first.map((d) => d.id));
    });

    it('should replace yesterday pending duties', async () => {
      const yesterday = await ctx.engine.ensureTodaysDuties(characterId);
      ctx.clock.advance(DAY_MS);

      const today = await ctx.engine.ensureTodaysDuties(characterId);
      expect(today).toHaveLength(4);
      today.forEach((duty) => expect(duty.dutyDay).toBe('2025-03-11'));
      expect(await ctx.store.getTask(yesterday[0].id)).toBeNull();
    });

    it('should share one board between bonded partners', async () => {
      const partnerId = (await ctx.engine.createCharacter({ name: 'Partner' })).id;
      await ctx.engine.createBond(characterId, partnerId);

      const mine = await ctx.engine.ensureTodaysDuties(characterId);
      const theirs = await ctx.engine.ensureTodaysDuties(partnerId);
      expect(theirs.map((d) => d.title)).toEqual(mine.map((d) => d.title));
      expect(theirs.every((d) => d.ownerId === partnerId)).toBe(true);
    });

    it('should allow one shuffle per day', async () => {
      const before = await ctx.engine.ensureTodaysDuties(characterId);
      const after = await ctx.engine.refreshDutyBoard(characterId);

      expect(after).toHaveLength(4);
      expect(after.some((d) => before.some((b) => b.id === d.id))).toBe(false);
      expect(await ctx.store.getTask(before[0].id)).toBeNull();

      const character = await ctx.engine.getCharacter(characterId);
      expect(character.dutyShuffleDay).toBe('2025-03-10');
      expect(character.dutyShuffleCount).toBe(1);

      await expect(ctx.engine.refreshDutyBoard(characterId)).rejects.toThrow('SHUFFLE_ALREADY_USED');

      // The shuffled board is kept on later visits
      const again = await ctx.engine.ensureTodaysDuties(characterId);
      expect(again.map((d) => d.id)).toEqual(after.map((d) => d.id));

      ctx.clock.advance(DAY_MS);
      await ctx.engine.ensureTodaysDuties(characterId);
      await expect(ctx.engine.refreshDutyBoard(characterId)).resolves.toHaveLength(4);
    });

    it('should keep claimed duties when shuffling', async () => {
      const board = await ctx.engine.ensureTodaysDuties(characterId);
      const claimed = await ctx.engine.claimDuty(characterId, board[0].id);

      const shuffled = await ctx.engine.refreshDutyBoard(characterId);
      expect(shuffled).toHaveLength(4);
      expect(shuffled[0].id).toBe(claimed.id);
      expect(shuffled.filter((d) => d.category === claimed.category)).toHaveLength(1);
    });

    it('should enforce the daily claim limit without side effects', async () => {
      const board = await ctx.engine.ensureTodaysDuties(characterId);
      const claimed = await ctx.engine.claimDuty(characterId, board[0].id);
      expect(claimed.status).toBe(TaskStatus.IN_PROGRESS);
      expect(claimed.isOnDutyBoard).toBe(false);
      expect(claimed.startedAt).toEqual(ctx.clock.now());

      await expect(ctx.engine.claimDuty(characterId, board[1].id)).rejects.toThrow('DAILY_CLAIM_LIMIT');

      const character = await ctx.engine.getCharacter(characterId);
      expect(character.dutyClaimsCount).toBe(1);
      expect(character.dutyClaimsDay).toBe('2025-03-10');
      expect((await ctx.engine.getTask(board[1].id)).status).toBe(TaskStatus.PENDING);
    });

    it('should not let a locked duty be started directly', async () => {
      const board = await ctx.engine.ensureTodaysDuties(characterId);
      await ctx.engine.claimDuty(characterId, board[0].id);
      await expect(ctx.engine.claimDuty(characterId, board[1].id)).rejects.toThrow('DAILY_CLAIM_LIMIT');

      await expect(ctx.engine.startTask(board[1].id)).rejects.toThrow('DUTY_NOT_CLAIMED');

      const untouched = await ctx.engine.getTask(board[1].id);
      expect(untouched.status).toBe(TaskStatus.PENDING);
      expect(untouched.isOnDutyBoard).toBe(true);
      expect(untouched.startedAt).toBeUndefined();
      expect((await ctx.engine.getCharacter(characterId)).dutyClaimsCount).toBe(1);
      expect(await ctx.engine.listTasks(characterId, TaskStatus.IN_PROGRESS)).toHaveLength(1);
    });

    it('should let only one of two overlapping claims through', async () => {
      const board = await ctx.engine.ensureTodaysDuties(characterId);

      const results = await Promise.allSettled([
        ctx.engine.claimDuty(characterId, board[0].id),
        ctx.engine.claimDuty(characterId, board[1].id),
      ]);

      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      const [, second] = results;
      expect(second.status === 'rejected' && second.reason).toEqual(new Error('DAILY_CLAIM_LIMIT'));
      expect(await ctx.engine.listTasks(characterId, TaskStatus.IN_PROGRESS)).toHaveLength(1);
      expect((await ctx.engine.getCharacter(characterId)).dutyClaimsCount).toBe(1);
    });

    it('should reject claims on tasks that are not available duties', async () => {
      const board = await ctx.engine.ensureTodaysDuties(characterId);
      const otherId = (await ctx.engine.createCharacter({ name: 'Other' })).id;
      const plain = await ctx.engine.createTask({ ownerId: characterId, title: 'Read', category: TaskCategory.MENTAL });

      await expect(ctx.engine.claimDuty(otherId, board[0].id)).rejects.toThrow('TASK_NOT_FOUND');
      await expect(ctx.engine.claimDuty(characterId, plain.id)).rejects.toThrow('NOT_A_DUTY');

      await ctx.engine.claimDuty(characterId, board[0].id);
      await expect(ctx.engine.claimDuty(characterId, board[0].id)).rejects.toThrow('DUTY_NOT_AVAILABLE');
    });

    it('should unlock one bonus duty after the claimed duty is done', async () => {
      const board = await ctx.engine.ensureTodaysDuties(characterId);
      await expect(ctx.engine.generateBonusDuty(characterId)).rejects.toThrow('BONUS_DUTY_LOCKED');

      const claimed = await ctx.engine.claimDuty(characterId, board[0].id);
      await expect(ctx.engine.generateBonusDuty(characterId)).rejects.toThrow('BONUS_DUTY_LOCKED');

      await ctx.store.commit({ tasks: [{ ...claimed, status: TaskStatus.COMPLETED, completedAt: ctx.clock.now() }] });

      const bonus = await ctx.engine.generateBonusDuty(characterId);
      expect(bonus.isBonusDuty).toBe(true);
      expect(bonus.title.startsWith(BONUS_TITLE_PREFIX)).toBe(true);
      expect(board.map((d) => d.category)).not.toContain(bonus.category);

      const again = await ctx.engine.generateBonusDuty(characterId);
      expect(again.id).toBe(bonus.id);

      const started = await ctx.engine.claimDuty(characterId, bonus.id);
      expect(started.status).toBe(TaskStatus.IN_PROGRESS);
      expect((await ctx.engine.getCharacter(characterId)).dutyClaimsCount).toBe(1);
    });
  });
});
