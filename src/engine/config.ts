import { z } from 'zod';

const startingDeckEntrySchema = z.object({
	templateId: z.string().min(1),
	count: z.number().int().positive()
});

export const gameConfigSchema = z.object({
	handSize: z.number().int().positive().default(5),
	rewardOptions: z.number().int().positive().default(3),
	startingDeck: z
		.array(startingDeckEntrySchema)
		.min(1, 'The starting deck needs at least one card.')
		.default([
			{ templateId: 'strike', count: 5 },
			{ templateId: 'defend', count: 5 },
			{ templateId: 'bash', count: 1 }
		]),
	playerMaxHealth: z.number().int().positive().default(100),
	playerMaxEnergy: z.number().int().nonnegative().default(3),
	// the presentation layer animates the turn change during this window
	turnEndDelaySeconds: z.number().nonnegative().default(0.5),
	defendBlock: z.number().int().nonnegative().default(5),
	cardAnimationSeconds: z.number().nonnegative().default(0.3)
});

export type GameConfig = z.output<typeof gameConfigSchema>;
export type GameConfigInput = z.input<typeof gameConfigSchema>;

/**
 * Merges caller overrides onto the defaults. Throws a ZodError on invalid values.
 */
export function loadGameConfig(overrides: GameConfigInput = {}): GameConfig {
	return gameConfigSchema.parse(overrides);
}
