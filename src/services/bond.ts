import { QUEST_CONSTANTS } from '@/config';
import { BondPerk, IBond } from '@/types';

const PERK_LEVELS: Record<BondPerk, number> = {
  [BondPerk.SHARED_DUTY_BOARD]: 1,
  [BondPerk.TASK_ASSIGNMENT]: 2,
  [BondPerk.QUICK_LEARNER]: 3,
  [BondPerk.BOND_EXP_BOOST]: 5,
  [BondPerk.FORTUNE_SEEKER]: 7,
  [BondPerk.PARTY_STREAK_BONUS]: 10,
  [BondPerk.RELENTLESS]: 12,
  [BondPerk.COOP_DUNGEONS]: 15,
  [BondPerk.SHARED_LOOT]: 20,
  [BondPerk.PARTY_ACHIEVEMENTS]: 25,
  [BondPerk.LEGENDARY_BOND]: 50,
};

const BOND_TITLES: Array<[number, string]> = [
  [50, 'Legendary Bond'],
  [40, 'Legends'],
  [30, 'Oathsworn'],
  [20, 'Ironbound'],
  [15, 'Battle Forged'],
  [10, 'Trusted Allies'],
  [5, 'Companions'],
  [1, 'Acquaintances'],
];

/**
 * Bond EXP needed to reach `level`: floor(50 * (level - 1)^1.3).
 */
export function bondExpRequired(level: number): number {
  if (level <= 1) return 0;
  return Math.floor(50 * Math.pow(level - 1, 1.3));
}

export function bondTitle(level: number): string {
  const match = BOND_TITLES.find(([minLevel]) => level >= minLevel);
  return match ? match[1] : 'Acquaintances';
}

export function unlockedPerks(bond: IBond): BondPerk[] {
  return Object.values(BondPerk).filter((perk) => PERK_LEVELS[perk] <= bond.bondLevel);
}

export function nextPerk(bond: IBond): BondPerk | undefined {
  return Object.values(BondPerk).find((perk) => PERK_LEVELS[perk] > bond.bondLevel);
}

export function isMember(bond: IBond, characterId: string): boolean {
  return bond.memberIds.includes(characterId);
}

/**
 * Add bond EXP and apply any level-ups. `bondExp` is cumulative, like
 * character EXP. Returns true when the level changed.
 */
export function gainBondExp(bond: IBond, amount: number, now: Date): boolean {
  if (amount <= 0) return false;
  bond.bondExp += amount;
  bond.lastInteractionAt = now;

  let leveledUp = false;
  while (bond.bondLevel < QUEST_CONSTANTS.BOND_MAX_LEVEL && bond.bondExp >= bondExpRequired(bond.bondLevel + 1)) {
    bond.bondLevel += 1;
    leveledUp = true;
  }
  return leveledUp;
}
