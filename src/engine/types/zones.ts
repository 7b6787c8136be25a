import type { ICardInstance } from './cards';
import type { ZoneIdentifier } from './enums';

/**
 * An ordered container of card instances. Zones are disjoint:
 * an instance sits in exactly one of them.
 */
export interface IZone {
	id: string;
	zoneType: ZoneIdentifier;
	entities: ICardInstance[];

	add(entity: ICardInstance): void;
	contains(instanceId: string): boolean;
	getAll(): ICardInstance[];
	getCount(): number;
}
