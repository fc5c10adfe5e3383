import mongoose, { FilterQuery } from 'mongoose';
import {
  IBond,
  ICharacter,
  IPendingConfirmation,
  IRoutineBundle,
  ITask,
} from '@/types';
import { Task, TaskRecord, toTask, toTaskRecord } from '@/models/Task';
import { Character, CharacterRecord, toCharacter, toCharacterRecord } from '@/models/Character';
import { Bond, BondRecord, toBond, toBondRecord } from '@/models/Bond';
import { RoutineBundle, RoutineBundleRecord, toRoutineBundle, toRoutineBundleRecord } from '@/models/RoutineBundle';
import { Confirmation } from '@/models/Confirmation';
import { typedLogger } from '@/lib/typed-logger';
import { GameStore, TaskQuery, UnitOfWork } from './game-store';

function buildTaskFilter(query: TaskQuery): FilterQuery<TaskRecord> {
  const filter: FilterQuery<TaskRecord> = {};
  if (query.ownerId !== undefined) filter.ownerId = query.ownerId;
  if (query.status !== undefined) {
    filter.status = Array.isArray(query.status) ? { $in: query.status } : query.status;
  }
  if (query.isHabit !== undefined) filter.isHabit = query.isHabit;
  if (query.isRecurring !== undefined) filter.isRecurring = query.isRecurring;
  if (query.isDailyDuty !== undefined) filter.isDailyDuty = query.isDailyDuty;
  if (query.dutyDay !== undefined) filter.dutyDay = query.dutyDay;
  if (query.coopPairId !== undefined) filter.coopPairId = query.coopPairId;
  if (query.completedSince !== undefined) filter.completedAt = { $gte: query.completedSince };
  if (query.dueBefore !== undefined) filter.dueDate = { $lt: query.dueBefore };
  return filter;
}

/**
 * MongoDB-backed store. `commit` runs inside a single transaction, so a
 * completion either lands in full or not at all (requires a replica set).
 */
export class MongoGameStore implements GameStore {
  async getTask(id: string): Promise<ITask | null> {
    const record = await Task.findById(id).lean<TaskRecord>();
    return record ? toTask(record) : null;
  }

  async findTasks(query: TaskQuery): Promise<ITask[]> {
    const records = await Task.find(buildTaskFilter(query)).sort({ createdAt: 1 }).lean<TaskRecord[]>();
    return records.map(toTask);
  }

  async getCharacter(id: string): Promise<ICharacter | null> {
    const record = await Character.findById(id).lean<CharacterRecord>();
    return record ? toCharacter(record) : null;
  }

  async getBond(id: string): Promise<IBond | null> {
    const record = await Bond.findById(id).lean<BondRecord>();
    return record ? toBond(record) : null;
  }

  async findBondByMember(characterId: string): Promise<IBond | null> {
    const record = await Bond.findOne({ memberIds: characterId }).lean<BondRecord>();
    return record ? toBond(record) : null;
  }

  async findRoutineBundles(ownerId: string): Promise<IRoutineBundle[]> {
    const records = await RoutineBundle.find({ ownerId }).lean<RoutineBundleRecord[]>();
    return records.map(toRoutineBundle);
  }

  async getConfirmation(token: string): Promise<IPendingConfirmation | null> {
    return Confirmation.findOne({ token }).select('-_id').lean<IPendingConfirmation>();
  }

  async commit(unit: UnitOfWork): Promise<void> {
    const session = await mongoose.startSession();
    try {
      await session.withTransaction(async () => {
        for (const task of unit.tasks ?? []) {
          const record = toTaskRecord(task);
          await Task.replaceOne({ _id: record._id }, record, { upsert: true, session });
        }
        for (const character of unit.characters ?? []) {
          const record = toCharacterRecord(character);
          await Character.replaceOne({ _id: record._id }, record, { upsert: true, session });
        }
        for (const bond of unit.bonds ?? []) {
          const record = toBondRecord(bond);
          await Bond.replaceOne({ _id: record._id }, record, { upsert: true, session });
        }
        for (const routine of unit.routines ?? []) {
          const record = toRoutineBundleRecord(routine);
          await RoutineBundle.replaceOne({ _id: record._id }, record, { upsert: true, session });
        }
        for (const confirmation of unit.confirmations ?? []) {
          await Confirmation.replaceOne({ token: confirmation.token }, confirmation, { upsert: true, session });
        }
        if (unit.deleteTaskIds && unit.deleteTaskIds.length > 0) {
          await Task.deleteMany({ _id: { $in: unit.deleteTaskIds } }, { session });
        }
      });
    } catch (error) {
      typedLogger.error('Store commit aborted', {
        error: error instanceof Error ? error.message : String(error),
        tasks: unit.tasks?.length ?? 0,
        characters: unit.characters?.length ?? 0,
      });
      throw error;
    } finally {
      await session.endSession();
    }
  }
}

export default MongoGameStore;
