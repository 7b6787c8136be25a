import type { CardType } from './enums';

export type RGBColor = readonly [number, number, number];

/**
 * Immutable card data, defined once at startup.
 * Several instances may share one template.
 */
export interface ICardTemplate {
	readonly id: string;
	readonly name: string;
	readonly type: CardType;
	readonly cost: number;
	readonly damage?: number;
	readonly block?: number;
	readonly vulnerable?: number;
	readonly draw?: number;
	readonly copy?: boolean; // adds a copy of itself to the discard pile on play
	readonly areaOfEffect?: boolean; // declared only; resolution targets the current enemy
	readonly description: string;
	readonly color: RGBColor;
}

/**
 * A runtime card. Owned by exactly one zone at a time.
 */
export interface ICardInstance {
	instanceId: string;
	templateId: string;
	name: string;
	type: CardType;
	cost: number;
	damage?: number;
	block?: number;
	vulnerable?: number;
	draw?: number;
	copy?: boolean;
	areaOfEffect?: boolean;
	description: string;
	color: RGBColor;
}

export interface ICardSnapshot {
	instanceId: string;
	name: string;
	cost: number;
	type: CardType;
	description: string;
	color: RGBColor;
	playable: boolean;
}
