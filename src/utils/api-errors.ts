export interface NormalizedError {
  code: string;
  message: string;
}

const ERROR_MESSAGES: Record<string, string> = {
  TASK_NOT_FOUND: 'Task not found',
  CHARACTER_NOT_FOUND: 'Character not found',
  BOND_NOT_FOUND: 'Bond not found',
  ROUTINE_NOT_FOUND: 'Routine bundle not found',
  CONFIRMATION_NOT_FOUND: 'Confirmation token not found',
  INVALID_TRANSITION: 'The task cannot move to the requested state',
  TASK_NOT_STARTED: 'Start the task before completing it',
  NOT_A_DUTY: 'Only duty board items can be claimed',
  DUTY_NOT_AVAILABLE: 'This duty is no longer on the board',
  DUTY_NOT_CLAIMED: 'Claim this duty from the board to start it',
  NO_LEVEL_UP_AVAILABLE: 'Not enough EXP to level up',
  INVALID_ROUTINE_SIZE: 'A routine must contain between 3 and 6 habits',
  INVALID_DUE_TIME: 'Due time must use the HH:mm format',
  DAILY_CLAIM_LIMIT: 'Daily duty limit reached. Come back tomorrow!',
  SHUFFLE_ALREADY_USED: 'The duty board can only be shuffled once per day',
  BONUS_DUTY_LOCKED: 'Finish your claimed duties to unlock a bonus duty',
  BOND_REQUIRED: 'Co-op tasks need an active bond',
  BOND_EXISTS: 'One of these characters is already bonded',
  INVALID_BOND: 'A character cannot bond with itself',
  INVALID_COORDINATES: 'Coordinates are out of range',
  LOCATION_UNAVAILABLE: 'Current location is unavailable',
  PHOTO_EMPTY: 'Photo data is empty',
  MIN_DURATION_NOT_MET: 'The minimum task duration has not elapsed',
  PHOTO_REQUIRED: 'Take a photo to verify this task',
  PHOTO_EXPIRED: 'Photo expired. Please take a new photo',
  LOCATION_REQUIRED: 'Capture your location to verify this task',
  DEADLINE_PASSED: 'This task is past its deadline',
  ALREADY_COMPLETED: 'This task is already completed',
  CHARACTER_REQUIRED: 'No character is linked to this task',
};

const CODE_PATTERN = /^[A-Z][A-Z0-9_]+$/;

/**
 * Map anything thrown into a `{ code, message }` pair. Service errors are
 * thrown as `new Error('SOME_CODE')`; anything else becomes `INTERNAL_ERROR`.
 */
export function normalizeError(error: unknown, fallbackMessage = 'Request failed'): NormalizedError {
  if (error instanceof Error && CODE_PATTERN.test(error.message)) {
    return {
      code: error.message,
      message: ERROR_MESSAGES[error.message] ?? fallbackMessage,
    };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error && error.message ? error.message : fallbackMessage,
  };
}

export const ERROR_STATUS_CODES: Record<string, number> = {
  TASK_NOT_FOUND: 404,
  CHARACTER_NOT_FOUND: 404,
  BOND_NOT_FOUND: 404,
  ROUTINE_NOT_FOUND: 404,
  CONFIRMATION_NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  TASK_NOT_STARTED: 409,
  NOT_A_DUTY: 400,
  DUTY_NOT_AVAILABLE: 409,
  DUTY_NOT_CLAIMED: 409,
  NO_LEVEL_UP_AVAILABLE: 409,
  INVALID_ROUTINE_SIZE: 400,
  INVALID_DUE_TIME: 400,
  DAILY_CLAIM_LIMIT: 429,
  SHUFFLE_ALREADY_USED: 429,
  BONUS_DUTY_LOCKED: 409,
  BOND_REQUIRED: 409,
  BOND_EXISTS: 409,
  INVALID_BOND: 400,
  INVALID_COORDINATES: 400,
  LOCATION_UNAVAILABLE: 422,
  PHOTO_EMPTY: 400,
  MIN_DURATION_NOT_MET: 422,
  PHOTO_REQUIRED: 422,
  PHOTO_EXPIRED: 422,
  LOCATION_REQUIRED: 422,
  DEADLINE_PASSED: 422,
  ALREADY_COMPLETED: 409,
  CHARACTER_REQUIRED: 409,
};

export function statusCodeFor(code: string): number {
  return ERROR_STATUS_CODES[code] ?? 500;
}
