import type { GameStateManager } from './GameStateManager';
import { pickRandom } from './Rng';
import { computeAttackDamage } from './StatusEffectHandler';
import type { IEnemy, IEnemyTemplate, IPlayer } from './types/combatants';
import { EnemyIntent } from './types/enums';

export class EnemyAI {
	constructor(private gsm: GameStateManager) {}

	public rollIntent(intents: readonly EnemyIntent[]): EnemyIntent {
		return pickRandom(this.gsm.rng, intents);
	}

	/**
	 * Builds an enemy from a uniformly chosen template (or the given one)
	 * and rolls its first intent so it can be shown before it acts.
	 */
	public spawnEnemy(template?: IEnemyTemplate): IEnemy {
		const chosen = template ?? pickRandom(this.gsm.rng, this.gsm.enemyTemplates);
		const enemy = this.gsm.objectFactory.createEnemy(chosen, this.rollIntent(chosen.intents));
		console.log(`[EnemyAI] ${enemy.name} appears (${enemy.health} HP), intends to ${enemy.intent}.`);
		return enemy;
	}

	/** Damage the current intent would deal right now, or null when not attacking. */
	public forecastDamage(enemy: IEnemy, player: IPlayer): number | null {
		if (enemy.intent !== EnemyIntent.Attack) return null;
		return computeAttackDamage(enemy.damage, enemy, player);
	}

	/**
	 * Executes the forecast intent. A killing blow ends the game and skips
	 * the rest of the turn; otherwise statuses tick down and the next intent is rolled.
	 */
	public takeTurn(enemy: IEnemy): void {
		const { state, statusHandler, config } = this.gsm;
		const player = state.player;

		// block gained on the previous enemy turn only lasts until this one
		statusHandler.resetBlock(enemy);

		switch (enemy.intent) {
			case EnemyIntent.Attack: {
				const damage = computeAttackDamage(enemy.damage, enemy, player);
				statusHandler.takeDamage(player, damage, 'player');
				console.log(`[EnemyAI] ${enemy.name} attacks for ${damage}; player at ${player.health} HP.`);
				if (player.health <= 0) {
					this.gsm.gameOver();
					return;
				}
				break;
			}
			case EnemyIntent.Defend:
				statusHandler.gainBlock(enemy, config.defendBlock, 'enemy');
				console.log(`[EnemyAI] ${enemy.name} defends (${enemy.block} block).`);
				break;
			case EnemyIntent.Buff:
				enemy.damage += enemy.buff;
				console.log(`[EnemyAI] ${enemy.name} grows stronger (damage ${enemy.damage}).`);
				break;
		}

		statusHandler.tickDown(enemy);

		enemy.intent = this.rollIntent(enemy.intents);
		this.gsm.eventBus.publish('enemyIntentChanged', { enemyName: enemy.name, intent: enemy.intent });
	}
}
