import {
  IBond,
  ICharacter,
  IPendingConfirmation,
  IRoutineBundle,
  ITask,
} from '@/types';
import { GameStore, TaskQuery, UnitOfWork, matchesTaskQuery } from './game-store';

/**
 * In-process store. Records are deep-copied on the way in and out, so a
 * caller can never mutate persisted state without going through `commit`.
 */
export class MemoryGameStore implements GameStore {
  private tasks = new Map<string, ITask>();
  private characters = new Map<string, ICharacter>();
  private bonds = new Map<string, IBond>();
  private routines = new Map<string, IRoutineBundle>();
  private confirmations = new Map<string, IPendingConfirmation>();

  async getTask(id: string): Promise<ITask | null> {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : null;
  }

  async findTasks(query: TaskQuery): Promise<ITask[]> {
    return [...this.tasks.values()]
      .filter((task) => matchesTaskQuery(task, query))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((task) => structuredClone(task));
  }

  async getCharacter(id: string): Promise<ICharacter | null> {
    const character = this.characters.get(id);
    return character ? structuredClone(character) : null;
  }

  async getBond(id: string): Promise<IBond | null> {
    const bond = this.bonds.get(id);
    return bond ? structuredClone(bond) : null;
  }

  async findBondByMember(characterId: string): Promise<IBond | null> {
    for (const bond of this.bonds.values()) {
      if (bond.memberIds.includes(characterId)) {
        return structuredClone(bond);
      }
    }
    return null;
  }

  async findRoutineBundles(ownerId: string): Promise<IRoutineBundle[]> {
    return [...this.routines.values()]
      .filter((bundle) => bundle.ownerId === ownerId)
      .map((bundle) => structuredClone(bundle));
  }

  async getConfirmation(token: string): Promise<IPendingConfirmation | null> {
    const confirmation = this.confirmations.get(token);
    return confirmation ? structuredClone(confirmation) : null;
  }

  async commit(unit: UnitOfWork): Promise<void> {
    // Copy everything before touching the maps so a bad record aborts the whole unit.
    const tasks = (unit.tasks ?? []).map((t) => structuredClone(t));
    const characters = (unit.characters ?? []).map((c) => structuredClone(c));
    const bonds = (unit.bonds ?? []).map((b) => structuredClone(b));
    const confirmations = (unit.confirmations ?? []).map((c) => structuredClone(c));
    const routines = (unit.routines ?? []).map((r) => structuredClone(r));

    for (const task of tasks) this.tasks.set(task.id, task);
    for (const character of characters) this.characters.set(character.id, character);
    for (const bond of bonds) this.bonds.set(bond.id, bond);
    for (const confirmation of confirmations) this.confirmations.set(confirmation.token, confirmation);
    for (const routine of routines) this.routines.set(routine.id, routine);
    for (const id of unit.deleteTaskIds ?? []) this.tasks.delete(id);
  }
}

export default MemoryGameStore;
