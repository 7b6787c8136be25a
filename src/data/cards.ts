import type { ICardTemplate } from '../engine/types/cards';
import { CardType } from '../engine/types/enums';

const ATTACK_RED = [0.8, 0.2, 0.2] as const;
const SKILL_BLUE = [0.2, 0.6, 0.8] as const;

export const cardTemplates: readonly ICardTemplate[] = [
	{ id: 'strike', name: 'Strike', type: CardType.Attack, cost: 1, damage: 6, description: 'Deal 6 damage', color: ATTACK_RED },
	{ id: 'defend', name: 'Defend', type: CardType.Skill, cost: 1, block: 5, description: 'Gain 5 block', color: SKILL_BLUE },
	{
		id: 'bash',
		name: 'Bash',
		type: CardType.Attack,
		cost: 2,
		damage: 8,
		vulnerable: 2,
		description: 'Deal 8 damage\nApply 2 Vulnerable',
		color: ATTACK_RED
	},
	{
		id: 'cleave',
		name: 'Cleave',
		type: CardType.Attack,
		cost: 1,
		damage: 4,
		areaOfEffect: true,
		description: 'Deal 4 damage to ALL enemies',
		color: ATTACK_RED
	},
	{
		id: 'shrug-it-off',
		name: 'Shrug It Off',
		type: CardType.Skill,
		cost: 1,
		block: 8,
		draw: 1,
		description: 'Gain 8 block\nDraw 1 card',
		color: SKILL_BLUE
	},
	{
		id: 'pommel-strike',
		name: 'Pommel Strike',
		type: CardType.Attack,
		cost: 1,
		damage: 9,
		draw: 1,
		description: 'Deal 9 damage\nDraw 1 card',
		color: ATTACK_RED
	},
	{
		id: 'anger',
		name: 'Anger',
		type: CardType.Attack,
		cost: 0,
		damage: 6,
		copy: true,
		description: 'Deal 6 damage\nAdd a copy to discard pile',
		color: ATTACK_RED
	},
	{
		id: 'iron-wave',
		name: 'Iron Wave',
		type: CardType.Attack,
		cost: 1,
		damage: 5,
		block: 5,
		description: 'Deal 5 damage\nGain 5 block',
		color: [0.8, 0.4, 0.2]
	}
];
