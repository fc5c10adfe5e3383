import { v4 as uuidv4 } from 'uuid';
import { QUEST_CONSTANTS } from '@/config';
import {
  EquipmentItem,
  ICharacter,
  ItemRarity,
  LootDrop,
  MaterialType,
  RandomSource,
  StatType,
} from '@/types';

const CONSUMABLE_NAMES = ['Herbal Tea', 'Energy Bar', 'Lucky Coin', 'Trail Mix'] as const;
const MATERIAL_TYPES: MaterialType[] = [
  MaterialType.ORE,
  MaterialType.CRYSTAL,
  MaterialType.HIDE,
  MaterialType.HERB,
  MaterialType.ESSENCE,
];
const EQUIPMENT_SLOTS = ['Blade', 'Helm', 'Gauntlets', 'Boots', 'Amulet', 'Ring'] as const;
const STAT_TYPES = Object.values(StatType);

const RARITY_PREFIX: Record<ItemRarity, string> = {
  [ItemRarity.COMMON]: 'Worn',
  [ItemRarity.UNCOMMON]: 'Sturdy',
  [ItemRarity.RARE]: 'Gleaming',
  [ItemRarity.EPIC]: 'Mythic',
};

const RARITY_POWER: Record<ItemRarity, number> = {
  [ItemRarity.COMMON]: 1,
  [ItemRarity.UNCOMMON]: 2,
  [ItemRarity.RARE]: 3,
  [ItemRarity.EPIC]: 5,
};

function pick<T>(items: readonly T[], rng: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[index];
}

export function rollRarity(rng: RandomSource): ItemRarity {
  const r = rng();
  if (r < 0.6) return ItemRarity.COMMON;
  if (r < 0.85) return ItemRarity.UNCOMMON;
  if (r < 0.97) return ItemRarity.RARE;
  return ItemRarity.EPIC;
}

export function generateEquipment(level: number, rng: RandomSource, now: Date): EquipmentItem {
  const tier = Math.max(1, Math.floor(level / 10) + 1);
  const rarity = rollRarity(rng);
  const slot = pick(EQUIPMENT_SLOTS, rng);
  const bonusStat = pick(STAT_TYPES, rng);
  return {
    id: uuidv4(),
    name: `${RARITY_PREFIX[rarity]} ${slot}`,
    tier,
    rarity,
    bonusStat,
    bonusAmount: tier * RARITY_POWER[rarity],
    acquiredAt: now,
  };
}

/**
 * One independent roll against stacked bands: equipment, then materials,
 * then consumables. `lootBonus` widens only the equipment band.
 */
export function rollTaskLoot(
  character: ICharacter,
  lootBonus: number,
  rng: RandomSource,
  now: Date
): LootDrop | undefined {
  const roll = rng();

  const equipChance = QUEST_CONSTANTS.LOOT_EQUIPMENT_CHANCE + lootBonus;
  if (roll < equipChance) {
    return { type: 'equipment', item: generateEquipment(character.level, rng, now) };
  }

  const materialChance = equipChance + QUEST_CONSTANTS.LOOT_MATERIAL_CHANCE;
  if (roll < materialChance) {
    const material = pick(MATERIAL_TYPES, rng);
    const rarity = rollRarity(rng);
    const quantity = rarity === ItemRarity.COMMON ? 1 + Math.min(2, Math.floor(rng() * 3)) : 1;
    return { type: 'material', material, rarity, quantity };
  }

  const consumableChance = materialChance + QUEST_CONSTANTS.LOOT_CONSUMABLE_CHANCE;
  if (roll < consumableChance) {
    return { type: 'consumable', name: pick(CONSUMABLE_NAMES, rng) };
  }

  return undefined;
}

export function luckLootBonus(character: ICharacter): number {
  return character.stats.luck * QUEST_CONSTANTS.LOOT_LUCK_FACTOR;
}

export function addLootToInventory(character: ICharacter, drop: LootDrop): void {
  switch (drop.type) {
    case 'equipment':
      character.inventory.equipment.push(drop.item);
      break;
    case 'material': {
      const existing = character.inventory.materials.find(
        (m) => m.type === drop.material && m.rarity === drop.rarity
      );
      if (existing) {
        existing.quantity += drop.quantity;
      } else {
        character.inventory.materials.push({ type: drop.material, rarity: drop.rarity, quantity: drop.quantity });
      }
      break;
    }
    case 'consumable':
      character.inventory.consumables[drop.name] = (character.inventory.consumables[drop.name] ?? 0) + 1;
      break;
  }
}
