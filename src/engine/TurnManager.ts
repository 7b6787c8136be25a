import type { GameStateManager } from './GameStateManager';
import { fail, succeed } from './results';
import type { ActionResult } from './types/game';
import { ActionFailureReason, GamePhase } from './types/enums';

/**
 * Turn flow inside a combat. Ending a turn is two-step: a request raises
 * `turnEnding`, and the commit happens once the presentation clock has
 * pushed `turnEndDelay` past the configured threshold.
 */
export class TurnManager {
	constructor(private gsm: GameStateManager) {}

	public requestEndTurn(): ActionResult {
		const { state } = this.gsm;
		if (state.turnEnding) {
			return fail(ActionFailureReason.TurnEnding, 'The turn is already ending.');
		}
		state.turnEnding = true;
		state.turnEndDelay = 0;
		this.gsm.recordAction({ type: 'requestEndTurn' });
		this.gsm.eventBus.publish('turnEndRequested', {});
		return succeed();
	}

	public advanceTime(deltaSeconds: number): void {
		const { state, config } = this.gsm;
		if (!state.turnEnding) return;
		state.turnEndDelay += deltaSeconds;
		if (state.turnEndDelay > config.turnEndDelaySeconds) {
			// cleared before committing so a second tick can never commit twice
			state.turnEnding = false;
			state.turnEndDelay = 0;
			this.endTurn();
		}
	}

	/**
	 * The player's block expires, the hand is discarded, the enemy acts,
	 * and unless that killed the player a new player turn begins.
	 */
	public endTurn(): void {
		const { state, deckManager, statusHandler } = this.gsm;
		console.log(`TurnManager: Ending turn ${state.turnNumber}.`);
		this.gsm.recordAction({ type: 'endTurn' });

		statusHandler.resetBlock(state.player);
		deckManager.discardHand();

		if (state.currentEnemy) {
			this.gsm.enemyAI.takeTurn(state.currentEnemy);
		}
		this.gsm.eventBus.publish('turnEnded', { turnNumber: state.turnNumber });

		if (state.phase !== GamePhase.Combat) {
			return;
		}
		this.startPlayerTurn();
	}

	public startPlayerTurn(): void {
		const { state, statusHandler, deckManager, config } = this.gsm;
		state.turnNumber++;
		state.player.energy = state.player.maxEnergy;
		statusHandler.tickDown(state.player);
		deckManager.draw(config.handSize);
		console.log(`TurnManager: Turn ${state.turnNumber} started with ${state.zones.hand.getCount()} cards in hand.`);
	}
}
