import { PASSWORD_MIN_LENGTH, RotationFailureReason } from "@keyshift/shared";

export interface RotationInput {
  oldSecret: string;
  newSecret: string;
  confirmSecret: string;
}

export interface RotationRejection {
  reason: RotationFailureReason;
  message: string;
}

export const ROTATION_MESSAGES: Record<RotationFailureReason, string> = {
  [RotationFailureReason.MISSING_FIELDS]: "All fields are required.",
  [RotationFailureReason.MISMATCH]: "New password and confirmation do not match.",
  [RotationFailureReason.TOO_SHORT]: `Password must be at least ${PASSWORD_MIN_LENGTH} characters.`,
  [RotationFailureReason.COMPLEXITY]: "Password must include upper, lower and a number.",
  [RotationFailureReason.PIN]: "Old PIN is incorrect.",
};

function reject(reason: RotationFailureReason): RotationRejection {
  return { reason, message: ROTATION_MESSAGES[reason] };
}

/**
 * Checks that run before the old PIN is verified, in this order:
 * presence, confirmation match, length, character classes.
 * Returns the first failure, or null if the new secret is acceptable.
 */
export function checkRotationInput(input: RotationInput): RotationRejection | null {
  const { oldSecret, newSecret, confirmSecret } = input;

  if (oldSecret === "" || newSecret === "" || confirmSecret === "") {
    return reject(RotationFailureReason.MISSING_FIELDS);
  }
  if (newSecret !== confirmSecret) {
    return reject(RotationFailureReason.MISMATCH);
  }
  // code points, so an astral character counts once
  if ([...newSecret].length < PASSWORD_MIN_LENGTH) {
    return reject(RotationFailureReason.TOO_SHORT);
  }
  if (!/[A-Z]/.test(newSecret) || !/[a-z]/.test(newSecret) || !/\d/.test(newSecret)) {
    return reject(RotationFailureReason.COMPLEXITY);
  }
  return null;
}
