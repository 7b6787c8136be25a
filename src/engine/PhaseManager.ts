import type { GameStateManager } from './GameStateManager';
import { pickRandom } from './Rng';
import { GamePhase } from './types/enums';

const allowedTransitions: Record<GamePhase, readonly GamePhase[]> = {
	[GamePhase.Menu]: [GamePhase.Combat],
	[GamePhase.Combat]: [GamePhase.Rewards, GamePhase.GameOver],
	[GamePhase.Rewards]: [GamePhase.Combat],
	[GamePhase.GameOver]: [GamePhase.Menu]
};

export class PhaseManager {
	constructor(private gsm: GameStateManager) {}

	public canTransition(from: GamePhase, to: GamePhase): boolean {
		return allowedTransitions[from].includes(to);
	}

	private setPhase(to: GamePhase): void {
		const from = this.gsm.state.phase;
		if (!this.canTransition(from, to)) {
			throw new Error(`Illegal phase transition: ${from} -> ${to}`);
		}
		this.gsm.state.phase = to;
		console.log(`PhaseManager: ${from} -> ${to}`);
		this.gsm.eventBus.publish('phaseChanged', { from, to });
	}

	/**
	 * Enters combat from the menu or from rewards: full energy, no block,
	 * a fresh enemy and an opening hand.
	 */
	public startCombat(): void {
		const { state, config } = this.gsm;
		this.setPhase(GamePhase.Combat);

		state.rewardCards = [];
		state.turnEnding = false;
		state.turnEndDelay = 0;
		state.player.energy = state.player.maxEnergy;
		this.gsm.statusHandler.resetBlock(state.player);

		state.combatNumber++;
		state.turnNumber = 1;
		state.currentEnemy = this.gsm.enemyAI.spawnEnemy();
		this.gsm.deckManager.draw(config.handSize);

		this.gsm.eventBus.publish('combatStarted', {
			combatNumber: state.combatNumber,
			enemyName: state.currentEnemy.name
		});
	}

	/**
	 * The enemy is dead. Reward choices are sampled with replacement from every
	 * card template; the hand is left as it is and the next combat draws on top of it.
	 */
	public endCombat(): void {
		const { state, config } = this.gsm;
		this.setPhase(GamePhase.Rewards);

		state.currentEnemy = null;
		state.turnEnding = false;
		state.turnEndDelay = 0;
		state.combatsWon++;

		state.rewardCards = [];
		for (let i = 0; i < config.rewardOptions; i++) {
			const template = pickRandom(this.gsm.rng, this.gsm.cardTemplates);
			state.rewardCards.push(this.gsm.objectFactory.instantiate(template));
		}
		console.log(
			`PhaseManager: Combat ${state.combatNumber} won. Rewards: ${state.rewardCards.map((c) => c.name).join(', ')}`
		);
		this.gsm.eventBus.publish('combatEnded', {
			combatNumber: state.combatNumber,
			rewardCount: state.rewardCards.length
		});
	}

	public gameOver(): void {
		const { state } = this.gsm;
		this.setPhase(GamePhase.GameOver);
		state.currentEnemy = null;
		state.turnEnding = false;
		state.turnEndDelay = 0;
	}

	/** Does not reset the session; callers build a new GameStateManager for a fresh run. */
	public returnToMenu(): void {
		this.setPhase(GamePhase.Menu);
	}
}
