import { setup, assign, assertEvent } from 'xstate';
import { GameStateManager, type GameStateManagerOptions } from '$engine/GameStateManager';
import { GamePhase } from '$engine/types/enums';
import type { ActionResult, IGameSnapshot } from '$engine/types/game';

export interface GameMachineInput {
	/** Builds the engine for each run; a fresh one is made after every game over. */
	createEngine?: () => GameStateManager;
	engineOptions?: GameStateManagerOptions;
}

interface GameContext {
	engine: GameStateManager;
	createEngine: () => GameStateManager;
	snapshot: IGameSnapshot;
	error: string | null;
}

type GameEvents =
	| { type: 'START_GAME' }
	| { type: 'PLAY_CARD'; handIndex: number }
	| { type: 'REQUEST_END_TURN' }
	| { type: 'TICK'; deltaSeconds: number }
	| { type: 'PICK_REWARD'; rewardIndex: number }
	| { type: 'SKIP_REWARD' }
	| { type: 'ACKNOWLEDGE_GAME_OVER' };

function afterIntent(context: GameContext, result: ActionResult): Partial<GameContext> {
	return {
		snapshot: context.engine.getSnapshot(),
		error: result.success ? null : result.message
	};
}

export const gameMachine = setup({
	types: {
		context: {} as GameContext,
		events: {} as GameEvents,
		input: {} as GameMachineInput
	},
	actions: {
		startGame: assign(({ context }) => afterIntent(context, context.engine.startGame())),

		playCard: assign(({ context, event }) => {
			assertEvent(event, 'PLAY_CARD');
			return afterIntent(context, context.engine.playCard(event.handIndex));
		}),

		requestEndTurn: assign(({ context }) => afterIntent(context, context.engine.requestEndTurn())),

		tick: assign(({ context, event }) => {
			assertEvent(event, 'TICK');
			return afterIntent(context, context.engine.advanceTime(event.deltaSeconds));
		}),

		pickReward: assign(({ context, event }) => {
			assertEvent(event, 'PICK_REWARD');
			return afterIntent(context, context.engine.pickReward(event.rewardIndex));
		}),

		skipReward: assign(({ context }) => afterIntent(context, context.engine.skipReward())),

		acknowledgeGameOver: assign(({ context }) => afterIntent(context, context.engine.acknowledgeGameOver())),

		startNewRun: assign(({ context }) => {
			const engine = context.createEngine();
			return { engine, snapshot: engine.getSnapshot(), error: null };
		})
	},
	guards: {
		engineInCombat: ({ context }) => context.engine.currentPhase === GamePhase.Combat,
		engineInRewards: ({ context }) => context.engine.currentPhase === GamePhase.Rewards,
		engineGameOver: ({ context }) => context.engine.currentPhase === GamePhase.GameOver
	}
}).createMachine({
	id: 'game',
	initial: 'menu',
	context: ({ input }) => {
		const createEngine = input.createEngine ?? (() => new GameStateManager(input.engineOptions));
		const engine = createEngine();
		return { engine, createEngine, snapshot: engine.getSnapshot(), error: null };
	},
	states: {
		menu: {
			on: {
				START_GAME: { actions: 'startGame' }
			},
			always: { target: 'combat', guard: 'engineInCombat' }
		},
		combat: {
			on: {
				PLAY_CARD: { actions: 'playCard' },
				REQUEST_END_TURN: { actions: 'requestEndTurn' },
				TICK: { actions: 'tick' }
			},
			always: [
				{ target: 'rewards', guard: 'engineInRewards' },
				{ target: 'gameOver', guard: 'engineGameOver' }
			]
		},
		rewards: {
			on: {
				PICK_REWARD: { actions: 'pickReward' },
				SKIP_REWARD: { actions: 'skipReward' },
				TICK: { actions: 'tick' }
			},
			always: { target: 'combat', guard: 'engineInCombat' }
		},
		gameOver: {
			on: {
				ACKNOWLEDGE_GAME_OVER: { target: 'menu', actions: ['acknowledgeGameOver', 'startNewRun'] },
				TICK: { actions: 'tick' }
			}
		}
	}
});
