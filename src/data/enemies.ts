import type { IEnemyTemplate } from '../engine/types/combatants';
import { EnemyIntent } from '../engine/types/enums';

export const enemyTemplates: readonly IEnemyTemplate[] = [
	{ id: 'slime', name: 'Slime', maxHealth: 30, damage: 8, intents: [EnemyIntent.Attack], color: [0.5, 0.7, 0.3] },
	{
		id: 'goblin',
		name: 'Goblin',
		maxHealth: 25,
		damage: 10,
		intents: [EnemyIntent.Attack, EnemyIntent.Defend],
		color: [0.7, 0.5, 0.2]
	},
	{
		id: 'cultist',
		name: 'Cultist',
		maxHealth: 20,
		damage: 6,
		buff: 3,
		intents: [EnemyIntent.Attack, EnemyIntent.Buff],
		color: [0.5, 0.2, 0.7]
	}
];
