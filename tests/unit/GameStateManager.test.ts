import { describe, test, expect } from 'vitest';
import { ZodError } from 'zod';
import { GameStateManager } from '../../src/engine/GameStateManager';
import { SeededRng } from '../../src/engine/Rng';
import { ActionFailureReason, CardType, GamePhase } from '../../src/engine/types/enums';
import type { ActionResult } from '../../src/engine/types/game';
import type { CardTemplateInput } from '../../src/data/schemas';
import { FixedRng, createTestEngine, handNames, trainingDummy } from './helpers';

function expectRejected(result: ActionResult, reason: ActionFailureReason): void {
	expect(result.success).toBe(false);
	if (!result.success) {
		expect(result.reason).toBe(reason);
	}
}

const strikes = (count: number): string[] => Array.from({ length: count }, () => 'strike');

describe('GameStateManager', () => {
	describe('Initialization', () => {
		test('starts in the menu with the default 11-card deck', () => {
			const engine = new GameStateManager({ rng: new FixedRng(), enemyTemplates: [trainingDummy] });

			expect(engine.currentPhase).toBe(GamePhase.Menu);
			expect(engine.state.zones.deck.getCount()).toBe(11);
			expect(engine.state.zones.hand.getCount()).toBe(0);
			expect(engine.state.player).toMatchObject({ health: 100, maxHealth: 100, energy: 3, maxEnergy: 3 });
			expect(engine.config.handSize).toBe(5);
			expect(engine.config.turnEndDelaySeconds).toBe(0.5);
		});

		test('startGame draws the opening hand and spawns an enemy', () => {
			const engine = new GameStateManager({ rng: new FixedRng(), enemyTemplates: [trainingDummy] });

			expect(engine.startGame()).toEqual({ success: true });

			expect(engine.currentPhase).toBe(GamePhase.Combat);
			expect(engine.state.zones.hand.getCount()).toBe(5);
			expect(engine.state.zones.deck.getCount()).toBe(6);
			expect(engine.state.currentEnemy?.name).toBe('Training Dummy');
			expect(engine.state.turnNumber).toBe(1);
			expect(engine.state.combatNumber).toBe(1);
		});

		test('rejects an invalid config', () => {
			expect(() => new GameStateManager({ config: { handSize: 0 } })).toThrow(ZodError);
		});

		test('rejects a starting deck naming an unknown card', () => {
			expect(() => createTestEngine({ deck: ['nope'] })).toThrow('Card template not found: nope');
		});

		test('rejects card templates with a negative cost', () => {
			const broken: CardTemplateInput = {
				id: 'broken',
				name: 'Broken',
				type: CardType.Attack,
				cost: -1,
				damage: 6,
				description: 'Deal 6 damage',
				color: [0.8, 0.2, 0.2]
			};
			expect(() => new GameStateManager({ cardTemplates: [broken] })).toThrow(ZodError);
		});
	});

	describe('Rule: intents are only accepted in their phase', () => {
		test('in the menu', () => {
			const engine = createTestEngine();

			expectRejected(engine.playCard(0), ActionFailureReason.WrongPhase);
			expectRejected(engine.requestEndTurn(), ActionFailureReason.WrongPhase);
			expectRejected(engine.pickReward(0), ActionFailureReason.WrongPhase);
			expectRejected(engine.acknowledgeGameOver(), ActionFailureReason.WrongPhase);
			expect(engine.currentPhase).toBe(GamePhase.Menu);
		});

		test('in combat', () => {
			const engine = createTestEngine();
			engine.startGame();

			expectRejected(engine.startGame(), ActionFailureReason.WrongPhase);
			expectRejected(engine.skipReward(), ActionFailureReason.WrongPhase);
			expectRejected(engine.acknowledgeGameOver(), ActionFailureReason.WrongPhase);
			expect(engine.state.combatNumber).toBe(1);
		});
	});

	describe('Rule: ending the turn waits for the delay', () => {
		test('commits once the accumulated delay exceeds the threshold', () => {
			const engine = createTestEngine();
			engine.startGame();

			expect(engine.requestEndTurn()).toEqual({ success: true });
			expect(engine.state.turnEnding).toBe(true);

			engine.advanceTime(0.3);
			expect(engine.state.player.health).toBe(100);
			expect(engine.state.turnNumber).toBe(1);

			engine.advanceTime(0.3);
			expect(engine.state.turnEnding).toBe(false);
			expect(engine.state.player.health).toBe(92);
			expect(engine.state.turnNumber).toBe(2);
			expect(engine.state.zones.hand.getCount()).toBe(5);
		});

		test('extra ticks never commit a second time', () => {
			const engine = createTestEngine();
			engine.startGame();
			engine.requestEndTurn();

			engine.advanceTime(0.6);
			engine.advanceTime(1);
			engine.advanceTime(1);

			expect(engine.state.player.health).toBe(92);
			expect(engine.state.actionHistory.filter((a) => a.type === 'endTurn')).toHaveLength(1);
		});

		test('playing or requesting again while the turn is ending is refused', () => {
			const engine = createTestEngine();
			engine.startGame();
			engine.requestEndTurn();

			expectRejected(engine.requestEndTurn(), ActionFailureReason.TurnEnding);
			expectRejected(engine.playCard(0), ActionFailureReason.TurnEnding);
			expect(engine.state.zones.hand.getCount()).toBe(5);
		});

		test('negative or non-finite time is rejected', () => {
			const engine = createTestEngine();

			expectRejected(engine.advanceTime(-1), ActionFailureReason.InvalidTime);
			expectRejected(engine.advanceTime(Number.NaN), ActionFailureReason.InvalidTime);
		});
	});

	describe('Rule: player block expires at the end of the player turn', () => {
		test('Defend does not carry into the enemy attack', () => {
			const engine = createTestEngine({ deck: ['defend', ...strikes(9)] });
			engine.startGame();

			engine.playCard(0);
			expect(engine.state.player.block).toBe(5);
			engine.requestEndTurn();
			engine.advanceTime(0.6);

			expect(engine.state.player.health).toBe(92);
			expect(engine.state.player.block).toBe(0);
		});

		test('block is gone before the enemy acts', () => {
			const engine = createTestEngine({ deck: ['defend', ...strikes(9)] });
			engine.startGame();
			engine.playCard(0);
			const blockWhenHit: number[] = [];
			engine.eventBus.subscribe('damageDealt', ({ target, blockUsed }) => {
				if (target === 'player') blockWhenHit.push(blockUsed);
			});

			engine.requestEndTurn();
			engine.advanceTime(0.6);

			expect(blockWhenHit).toEqual([0]);
		});

		test('the discard pile cycles back in once the deck runs out', () => {
			const engine = createTestEngine({ deck: ['defend', ...strikes(9)] });
			engine.startGame();
			engine.playCard(0);

			engine.requestEndTurn();
			engine.advanceTime(0.6);

			expect(engine.state.zones.hand.getCount()).toBe(5);
			expect(engine.state.zones.deck.getCount()).toBe(0);
			expect(engine.state.zones.discardPile.getCount()).toBe(5);

			engine.requestEndTurn();
			engine.advanceTime(0.6);

			expect(engine.state.player.health).toBe(84);
			expect(engine.state.zones.hand.getCount()).toBe(5);
			expect(engine.state.zones.deck.getCount()).toBe(5);
			expect(engine.state.zones.discardPile.getCount()).toBe(0);
		});
	});

	describe('Rule: rewards', () => {
		const winFirstCombat = (): GameStateManager => {
			const engine = createTestEngine({ deck: strikes(6), enemy: { maxHealth: 6 } });
			engine.startGame();
			engine.playCard(0);
			return engine;
		};

		test('winning offers three sampled cards', () => {
			const engine = winFirstCombat();

			expect(engine.currentPhase).toBe(GamePhase.Rewards);
			expect(engine.state.rewardCards.map((c) => c.name)).toEqual(['Iron Wave', 'Iron Wave', 'Iron Wave']);
			expect(engine.state.combatsWon).toBe(1);
		});

		test('picking a reward adds a copy to the deck and starts the next combat', () => {
			const engine = winFirstCombat();
			const reward = engine.state.rewardCards[0];

			expect(engine.pickReward(0)).toEqual({ success: true });

			expect(engine.currentPhase).toBe(GamePhase.Combat);
			expect(engine.deckManager.totalCardCount()).toBe(7);
			// four cards stayed in hand after the win; the new combat draws the remaining three
			expect(engine.state.zones.hand.getCount()).toBe(7);
			expect(engine.state.zones.deck.getCount()).toBe(0);
			expect(engine.state.combatNumber).toBe(2);
			expect(engine.state.rewardCards).toEqual([]);
			const owned = [...engine.state.zones.hand.getAll(), ...engine.state.zones.deck.getAll()];
			expect(owned.some((c) => c.instanceId === reward.instanceId)).toBe(false);
			expect(owned.filter((c) => c.name === 'Iron Wave')).toHaveLength(1);
		});

		test('an out-of-range reward index keeps the rewards screen', () => {
			const engine = winFirstCombat();

			expectRejected(engine.pickReward(3), ActionFailureReason.InvalidIndex);
			expect(engine.currentPhase).toBe(GamePhase.Rewards);
		});

		test('skipping leaves the deck unchanged', () => {
			const engine = winFirstCombat();

			expect(engine.skipReward()).toEqual({ success: true });

			expect(engine.currentPhase).toBe(GamePhase.Combat);
			expect(engine.deckManager.totalCardCount()).toBe(6);
		});
	});

	describe('Rule: game over', () => {
		test('a lethal enemy attack ends the run and acknowledging returns to the menu', () => {
			const engine = createTestEngine();
			engine.startGame();
			engine.state.player.health = 1;

			engine.requestEndTurn();
			engine.advanceTime(0.6);

			expect(engine.currentPhase).toBe(GamePhase.GameOver);
			expect(engine.state.currentEnemy).toBeNull();
			expect(engine.state.zones.hand.getCount()).toBe(0);
			expect(engine.state.turnNumber).toBe(1);

			expect(engine.acknowledgeGameOver()).toEqual({ success: true });
			expect(engine.currentPhase).toBe(GamePhase.Menu);
		});
	});

	describe('Snapshots', () => {
		test('reflects playability, forecast and pile sizes', () => {
			const engine = createTestEngine({ deck: ['bash', ...strikes(4)] });
			engine.startGame();
			engine.playCard(1);
			engine.playCard(1);

			const snapshot = engine.getSnapshot();

			expect(snapshot.phase).toBe(GamePhase.Combat);
			expect(snapshot.player.energy).toBe(1);
			expect(snapshot.hand.map((c) => [c.name, c.playable])).toEqual([
				['Bash', false],
				['Strike', true],
				['Strike', true]
			]);
			expect(snapshot.enemy?.health).toBe(28);
			expect(snapshot.enemy?.forecastDamage).toBe(8);
			expect(snapshot.deckCount).toBe(0);
			expect(snapshot.discardCount).toBe(2);
			expect(snapshot.rewards).toEqual([]);
			expect(snapshot.turnEnding).toBe(false);
		});

		test('the animation flag clears after its duration', () => {
			const engine = createTestEngine();
			engine.startGame();
			engine.playCard(0);

			expect(engine.isAnimating).toBe(true);
			engine.advanceTime(0.2);
			expect(engine.isAnimating).toBe(true);
			engine.advanceTime(0.2);
			expect(engine.isAnimating).toBe(false);
			expect(engine.getSnapshot().isAnimating).toBe(false);
		});
	});

	test('the same seed replays the same combat', () => {
		const first = new GameStateManager({ rng: new SeededRng(42) });
		const second = new GameStateManager({ rng: new SeededRng(42) });

		first.startGame();
		second.startGame();

		expect(handNames(second)).toEqual(handNames(first));
		expect(second.getSnapshot()).toEqual(first.getSnapshot());
	});
});
