// Geographic types
export interface Coordinates {
  lat: number;
  lng: number;
}

export interface Geofence extends Coordinates {
  radius: number;
  name?: string;
}

// Task related types
export enum TaskStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'inProgress',
  COMPLETED = 'completed',
  FAILED = 'failed',
  EXPIRED = 'expired',
}

export enum TaskCategory {
  PHYSICAL = 'physical',
  MENTAL = 'mental',
  SOCIAL = 'social',
  HOUSEHOLD = 'household',
  WELLNESS = 'wellness',
  CREATIVE = 'creative',
}

export enum VerificationType {
  NONE = 'none',
  PHOTO = 'photo',
  LOCATION = 'location',
  BOTH = 'both',
}

export enum CompletionMode {
  STANDARD = 'standard',
  MINI_GAME = 'miniGame',
  HABIT = 'habit',
}

export enum MiniGameKind {
  SUDOKU = 'sudoku',
  MEMORY_MATCH = 'memoryMatch',
  MATH_BLITZ = 'mathBlitz',
  WORD_SEARCH = 'wordSearch',
  TILE_MERGE = 'tileMerge',
}

export interface PhotoProof {
  byteLength: number;
  capturedAt: Date;
  motionDetected: boolean;
}

export interface TaskProof {
  photo?: PhotoProof;
  location?: Coordinates;
}

export interface ITask {
  id: string;
  ownerId: string;
  title: string;
  description: string;
  category: TaskCategory;
  verificationType: VerificationType;
  status: TaskStatus;
  completionMode: CompletionMode;
  miniGameKind?: MiniGameKind;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  dueDate?: Date;
  minimumDurationSeconds?: number;
  geofence?: Geofence;
  proof: TaskProof;
  customExp?: number;
  customGold?: number;

  // Flags
  isOnDutyBoard: boolean;
  isDailyDuty: boolean;
  isHabit: boolean;
  isRecurring: boolean;
  isFromPartner: boolean;
  isSharedWithPartner: boolean;
  isCoop: boolean;

  // Duty board
  dutyDay?: string;
  isBonusDuty?: boolean;

  // Habit tracking (day keys in the configured timezone)
  habitDueTime?: string;
  habitCompletedOn?: string;
  habitFailedOn?: string;
  habitStreak: number;
  habitLongestStreak: number;

  // Co-op / partner
  coopPairId?: string;
  coopBonusAwarded: boolean;
  partnerConfirmed: boolean;
}

// Character related types
export enum StatType {
  STRENGTH = 'strength',
  WISDOM = 'wisdom',
  CHARISMA = 'charisma',
  DEXTERITY = 'dexterity',
  LUCK = 'luck',
  DEFENSE = 'defense',
}

export type Stats = Record<StatType, number>;

export enum CharacterClass {
  WARRIOR = 'warrior',
  MAGE = 'mage',
  ARCHER = 'archer',
  BERSERKER = 'berserker',
  PALADIN = 'paladin',
  SORCERER = 'sorcerer',
  ENCHANTER = 'enchanter',
  RANGER = 'ranger',
  TRICKSTER = 'trickster',
}

export enum ItemRarity {
  COMMON = 'common',
  UNCOMMON = 'uncommon',
  RARE = 'rare',
  EPIC = 'epic',
}

export enum MaterialType {
  ORE = 'ore',
  CRYSTAL = 'crystal',
  HIDE = 'hide',
  HERB = 'herb',
  ESSENCE = 'essence',
}

export interface EquipmentItem {
  id: string;
  name: string;
  tier: number;
  rarity: ItemRarity;
  bonusStat: StatType;
  bonusAmount: number;
  acquiredAt: Date;
}

export interface Inventory {
  consumables: Record<string, number>;
  materials: Array<{ type: MaterialType; rarity: ItemRarity; quantity: number }>;
  equipment: EquipmentItem[];
}

export interface StreakState {
  current: number;
  longest: number;
  lastActiveDay?: string;
}

export interface ICharacter {
  id: string;
  name: string;
  characterClass: CharacterClass | null;
  level: number;
  exp: number;
  gold: number;
  unspentStatPoints: number;
  stats: Stats;
  streak: StreakState;
  tasksCompleted: number;
  onboardingComplete: boolean;

  // Day-stamped duty board counters
  dutyClaimsDay?: string;
  dutyClaimsCount: number;
  dutyShuffleDay?: string;
  dutyShuffleCount: number;

  inventory: Inventory;
  createdAt: Date;
}

// Bond / partner types
export enum BondPerk {
  SHARED_DUTY_BOARD = 'sharedDutyBoard',
  TASK_ASSIGNMENT = 'taskAssignment',
  QUICK_LEARNER = 'quickLearner',
  BOND_EXP_BOOST = 'bondExpBoost',
  FORTUNE_SEEKER = 'fortuneSeeker',
  PARTY_STREAK_BONUS = 'partyStreakBonus',
  RELENTLESS = 'relentless',
  COOP_DUNGEONS = 'coopDungeons',
  SHARED_LOOT = 'sharedLoot',
  PARTY_ACHIEVEMENTS = 'partyAchievements',
  LEGENDARY_BOND = 'legendaryBond',
}

export interface IBond {
  id: string;
  memberIds: [string, string];
  bondLevel: number;
  bondExp: number;
  createdAt: Date;
  lastInteractionAt?: Date;
}

export enum RoutineTimeOfDay {
  MORNING = 'morning',
  AFTERNOON = 'afternoon',
  EVENING = 'evening',
  ANYTIME = 'anytime',
}

export interface IRoutineBundle {
  id: string;
  ownerId: string;
  name: string;
  description?: string;
  timeOfDay: RoutineTimeOfDay;
  habitIds: string[];
  isArchived: boolean;
  createdAt: Date;
}

// Verification types
export enum VerificationTier {
  NONE = 'none',
  PHOTO = 'photo',
  LOCATION = 'location',
  BOTH = 'both',
}

export interface GeofenceResult {
  inRange: boolean;
  distance: number;
  radius: number;
  distanceText: string;
}

export interface CompletionCheck {
  allowed: boolean;
  reason?: string;
  code?: RejectionCode;
  remainingSeconds: number;
}

export enum AnomalyType {
  RAPID_COMPLETION = 'rapidCompletion',
  LATE_NIGHT_ACTIVITY = 'lateNightActivity',
  EXCESSIVE_DAILY_COUNT = 'excessiveDailyCount',
}

export interface AnomalyFlag {
  type: AnomalyType;
  description: string;
}

// Completion types
export type RejectionCode =
  | 'MIN_DURATION_NOT_MET'
  | 'PHOTO_REQUIRED'
  | 'PHOTO_EXPIRED'
  | 'LOCATION_REQUIRED'
  | 'DEADLINE_PASSED'
  | 'TASK_NOT_STARTED'
  | 'ALREADY_COMPLETED'
  | 'CHARACTER_REQUIRED'
  | 'BOND_REQUIRED'
  | 'DAILY_CLAIM_LIMIT'
  | 'SHUFFLE_ALREADY_USED';

export interface StatGain {
  stat: StatType;
  amount: number;
}

export type LootDrop =
  | { type: 'equipment'; item: EquipmentItem }
  | { type: 'material'; material: MaterialType; rarity: ItemRarity; quantity: number }
  | { type: 'consumable'; name: string };

export interface LevelProgress {
  level: number;
  exp: number;
  current: number;
  required: number;
  ratio: number;
}

export interface TaskCompletionResult {
  taskId: string;
  expGained: number;
  goldGained: number;
  progressBefore: LevelProgress;
  progressAfter: LevelProgress;
  levelUpAvailable: boolean;
  bonusStatGains: StatGain[];
  verificationTier: VerificationTier;
  verificationMultiplier: number;
  geofence?: GeofenceResult;
  classAffinityBonusExp: number;
  routineBundleCompleted: boolean;
  routineBonusExp: number;
  isCoop: boolean;
  coopBonusExp: number;
  coopBonusGold: number;
  coopBondExp: number;
  coopPartnerCompleted: boolean;
  lootDropped?: LootDrop;
  anomalyFlags: AnomalyFlag[];
  pendingConfirmation?: string;
}

export type CompletionOutcome =
  | { status: 'completed'; result: TaskCompletionResult }
  | { status: 'rejected'; code: RejectionCode; reason: string; remainingSeconds?: number };

// Two-phase confirmations
export enum ConfirmationKind {
  ACTIVITY = 'activity',
  PARTNER = 'partner',
}

export enum ConfirmationStatus {
  PENDING = 'pending',
  APPLIED = 'applied',
  DISCARDED = 'discarded',
}

export interface IPendingConfirmation {
  token: string;
  taskId: string;
  characterId: string;
  bondId?: string;
  kind: ConfirmationKind;
  expDelta: number;
  goldDelta: number;
  bondExpDelta: number;
  status: ConfirmationStatus;
  createdAt: Date;
  resolvedAt?: Date;
}

export interface ConfirmationOutcome {
  token: string;
  status: ConfirmationStatus;
  expApplied: number;
  goldApplied: number;
  bondExpApplied: number;
  levelUpAvailable: boolean;
}

// External collaborators
export interface Clock {
  now(): Date;
}

export type RandomSource = () => number;

export interface MotionSampleSource {
  samples(): number[];
}

export interface LocationSource {
  currentLocation(): Promise<Coordinates | null>;
}

export interface ActivityConfirmationSource {
  confirm(task: ITask): Promise<boolean>;
}

export enum NotificationKind {
  TASK_COMPLETED = 'task_completed',
  HABIT_FAILED = 'habit_failed',
  LEVEL_UP_READY = 'level_up_ready',
  CONFIRMATION_APPLIED = 'confirmation_applied',
}

export interface GameNotification {
  kind: NotificationKind;
  characterId: string;
  title: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface NotificationSink {
  notify(notification: GameNotification): Promise<void>;
}
