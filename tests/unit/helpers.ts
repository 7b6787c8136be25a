import { GameStateManager } from '../../src/engine/GameStateManager';
import type { IRng } from '../../src/engine/Rng';
import type { GameConfigInput } from '../../src/engine/config';
import type { EnemyTemplateInput } from '../../src/data/schemas';
import { EnemyIntent } from '../../src/engine/types/enums';

/**
 * Always answers the same end of the range. With 'max' every shuffle
 * leaves the deck in order and every pick takes the last option.
 */
export class FixedRng implements IRng {
	constructor(private mode: 'min' | 'max' = 'max') {}

	nextInt(min: number, max: number): number {
		return this.mode === 'min' ? min : max;
	}
}

/**
 * Returns queued values (clamped to the range), then falls back to max.
 */
export class ScriptedRng implements IRng {
	private queue: number[];

	constructor(values: number[] = []) {
		this.queue = [...values];
	}

	push(...values: number[]): void {
		this.queue.push(...values);
	}

	nextInt(min: number, max: number): number {
		const next = this.queue.shift();
		if (next === undefined) return max;
		return Math.min(max, Math.max(min, next));
	}
}

export const trainingDummy: EnemyTemplateInput = {
	id: 'dummy',
	name: 'Training Dummy',
	maxHealth: 40,
	damage: 8,
	intents: [EnemyIntent.Attack],
	color: [0.5, 0.5, 0.5]
};

export interface TestEngineOptions {
	/** Card template ids, in draw order (the default rng keeps shuffles in order). */
	deck?: string[];
	enemy?: Partial<EnemyTemplateInput>;
	rng?: IRng;
	config?: GameConfigInput;
}

export function createTestEngine(options: TestEngineOptions = {}): GameStateManager {
	const deck = options.deck ?? ['strike', 'strike', 'strike', 'strike', 'strike', 'defend', 'defend'];
	return new GameStateManager({
		rng: options.rng ?? new FixedRng('max'),
		config: {
			...options.config,
			startingDeck: deck.map((templateId) => ({ templateId, count: 1 }))
		},
		enemyTemplates: [{ ...trainingDummy, ...options.enemy }]
	});
}

export function handNames(engine: GameStateManager): string[] {
	return engine.state.zones.hand.getAll().map((card) => card.name);
}
