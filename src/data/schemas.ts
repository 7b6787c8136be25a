import { z } from 'zod';
import { CardType, EnemyIntent } from '../engine/types/enums';

const count = z.number().int().nonnegative();
const colorSchema = z.tuple([
	z.number().min(0).max(1),
	z.number().min(0).max(1),
	z.number().min(0).max(1)
]);

export const cardTemplateSchema = z.object({
	id: z.string().min(1, 'Card template id is required.'),
	name: z.string().min(1, 'Card name is required.'),
	type: z.nativeEnum(CardType),
	cost: count,
	damage: count.optional(),
	block: count.optional(),
	vulnerable: count.optional(),
	draw: count.optional(),
	copy: z.boolean().optional(),
	areaOfEffect: z.boolean().optional(),
	description: z.string(),
	color: colorSchema
});

export const enemyTemplateSchema = z.object({
	id: z.string().min(1, 'Enemy template id is required.'),
	name: z.string().min(1, 'Enemy name is required.'),
	maxHealth: z.number().int().positive(),
	damage: count,
	buff: count.optional(),
	intents: z.array(z.nativeEnum(EnemyIntent)).min(1, 'An enemy needs at least one intent.'),
	color: colorSchema
});

export const cardTemplateListSchema = z
	.array(cardTemplateSchema)
	.min(1, 'At least one card template is required.')
	.refine((templates) => new Set(templates.map((t) => t.id)).size === templates.length, {
		message: 'Card template ids must be unique.'
	});

export const enemyTemplateListSchema = z
	.array(enemyTemplateSchema)
	.min(1, 'At least one enemy template is required.');

export type CardTemplateInput = z.input<typeof cardTemplateSchema>;
export type EnemyTemplateInput = z.input<typeof enemyTemplateSchema>;
