import type { ActionResult } from './types/game';
import type { ActionFailureReason } from './types/enums';

export function succeed(): ActionResult {
	return { success: true };
}

export function fail(reason: ActionFailureReason, message: string): ActionResult {
	console.warn(`[GSM] Intent rejected (${reason}): ${message}`);
	return { success: false, reason, message };
}
