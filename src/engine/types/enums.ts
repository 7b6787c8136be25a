export enum CardType {
	Attack = 'attack',
	Skill = 'skill'
}

export enum EnemyIntent {
	Attack = 'attack',
	Defend = 'defend',
	Buff = 'buff'
}

export enum GamePhase {
	Menu = 'menu',
	Combat = 'combat',
	Rewards = 'rewards',
	GameOver = 'gameover'
}

export enum ZoneIdentifier {
	Deck = 'deck',
	Hand = 'hand',
	DiscardPile = 'discardPile'
}

export enum StatusType {
	Block = 'block',
	Vulnerable = 'vulnerable',
	Weak = 'weak'
}

/**
 * Why an intent was rejected. All of these leave the state untouched.
 */
export enum ActionFailureReason {
	WrongPhase = 'WRONG_PHASE',
	InvalidIndex = 'INVALID_INDEX',
	InsufficientEnergy = 'INSUFFICIENT_ENERGY',
	TurnEnding = 'TURN_ENDING',
	InvalidTime = 'INVALID_TIME'
}
