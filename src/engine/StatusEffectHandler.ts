import type { EventBus } from './EventBus';
import type { ICombatant, IStatusEffects } from './types/combatants';
import { StatusType } from './types/enums';

export type CombatantSide = 'player' | 'enemy';

export const VULNERABLE_MULTIPLIER = 1.5;
export const WEAK_MULTIPLIER = 0.75;

export interface DamageResult {
	healthLost: number;
	blockUsed: number;
}

/**
 * Scales a base damage value by the attacker's Weak, then the defender's Vulnerable.
 * Each step floors to an integer.
 */
export function computeAttackDamage(base: number, attacker: IStatusEffects, defender: IStatusEffects): number {
	let damage = base;
	if (attacker.weak > 0) {
		damage = Math.floor(damage * WEAK_MULTIPLIER);
	}
	if (defender.vulnerable > 0) {
		damage = Math.floor(damage * VULNERABLE_MULTIPLIER);
	}
	return damage;
}

/**
 * Block absorbs first, the remainder comes off health (never below 0).
 * Multipliers must already be applied to `amount`.
 */
export function resolveDamage(entity: ICombatant, amount: number): DamageResult {
	if (amount <= entity.block) {
		entity.block -= amount;
		return { healthLost: 0, blockUsed: amount };
	}
	const blockUsed = entity.block;
	const remainder = amount - blockUsed;
	entity.block = 0;
	const healthBefore = entity.health;
	entity.health = Math.max(0, entity.health - remainder);
	return { healthLost: healthBefore - entity.health, blockUsed };
}

/**
 * Block, Vulnerable and Weak bookkeeping for both combatants.
 */
export class StatusEffectHandler {
	constructor(private eventBus: EventBus) {}

	public takeDamage(entity: ICombatant, amount: number, side: CombatantSide): DamageResult {
		const result = resolveDamage(entity, Math.max(0, amount));
		this.eventBus.publish('damageDealt', { target: side, amount, ...result });
		return result;
	}

	public gainBlock(entity: IStatusEffects, amount: number, side: CombatantSide): void {
		if (amount <= 0) return;
		entity.block += amount;
		this.eventBus.publish('blockGained', { target: side, amount });
	}

	/** Stacks onto the existing counter rather than refreshing it. */
	public applyVulnerable(entity: IStatusEffects, amount: number, side: CombatantSide): void {
		this.applyTimedStatus(entity, StatusType.Vulnerable, amount, side);
	}

	public applyWeak(entity: IStatusEffects, amount: number, side: CombatantSide): void {
		this.applyTimedStatus(entity, StatusType.Weak, amount, side);
	}

	public resetBlock(entity: IStatusEffects): void {
		entity.block = 0;
	}

	/** One turn passes for the owner's timed statuses. */
	public tickDown(entity: IStatusEffects): void {
		if (entity.vulnerable > 0) entity.vulnerable -= 1;
		if (entity.weak > 0) entity.weak -= 1;
	}

	private applyTimedStatus(
		entity: IStatusEffects,
		status: StatusType.Vulnerable | StatusType.Weak,
		amount: number,
		side: CombatantSide
	): void {
		if (amount <= 0) return;
		entity[status] += amount;
		console.log(`[StatusHandler] ${side} gained ${amount} ${status} (now ${entity[status]})`);
		this.eventBus.publish('statusApplied', { target: side, status, amount });
	}
}
