import type { RGBColor } from './cards';
import type { EnemyIntent } from './enums';

/**
 * Shared by player and enemy; the same rules apply to both.
 */
export interface IStatusEffects {
	block: number;
	vulnerable: number; // turns remaining
	weak: number; // turns remaining
}

export interface ICombatant extends IStatusEffects {
	health: number;
	maxHealth: number;
}

export interface IPlayer extends ICombatant {
	energy: number;
	maxEnergy: number;
}

export interface IEnemyTemplate {
	readonly id: string;
	readonly name: string;
	readonly maxHealth: number;
	readonly damage: number;
	readonly buff?: number;
	readonly intents: readonly EnemyIntent[];
	readonly color: RGBColor;
}

export interface IEnemy extends ICombatant {
	templateId: string;
	name: string;
	damage: number; // base damage, raised permanently by buff intents
	buff: number;
	intents: readonly EnemyIntent[];
	intent: EnemyIntent;
	color: RGBColor;
}

export interface IPlayerSnapshot {
	health: number;
	maxHealth: number;
	energy: number;
	maxEnergy: number;
	block: number;
	vulnerable: number;
	weak: number;
}

export interface IEnemySnapshot {
	name: string;
	health: number;
	maxHealth: number;
	block: number;
	vulnerable: number;
	weak: number;
	intent: EnemyIntent;
	forecastDamage: number | null;
	color: RGBColor;
}
