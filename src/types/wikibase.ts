/**
 * Wikibase JSON data model
 *
 * Shapes of entities, statements, snaks, references and data values as
 * returned by `wbgetentities` and accepted by `wbeditentity`.
 *
 * @see https://www.mediawiki.org/wiki/Wikibase/DataModel/JSON
 */

export type Rank = 'preferred' | 'normal' | 'deprecated';

export type EntityType = 'item' | 'property' | 'lexeme' | 'form' | 'sense';

/**
 * Property datatypes with a known value type.
 * Fetched snaks may carry newer datatypes, so snak `datatype` fields stay `string`.
 */
export const DATA_TYPE_VALUE_TYPES = {
  commonsMedia: 'string',
  'geo-shape': 'string',
  'tabular-data': 'string',
  url: 'string',
  'external-id': 'string',
  'wikibase-item': 'wikibase-entityid',
  'wikibase-property': 'wikibase-entityid',
  'globe-coordinate': 'globecoordinate',
  monolingualtext: 'monolingualtext',
  quantity: 'quantity',
  string: 'string',
  time: 'time',
  'musical-notation': 'string',
  math: 'string',
  'wikibase-lexeme': 'wikibase-entityid',
  'wikibase-form': 'wikibase-entityid',
  'wikibase-sense': 'wikibase-entityid',
} as const satisfies Record<string, DataValueType>;

export type KnownDataType = keyof typeof DATA_TYPE_VALUE_TYPES;

export function isKnownDataType(datatype: string): datatype is KnownDataType {
  return Object.prototype.hasOwnProperty.call(DATA_TYPE_VALUE_TYPES, datatype);
}

export interface StringDataValue {
  type: 'string';
  value: string;
}

export interface WikibaseEntityIdValue {
  'entity-type': EntityType;
  'numeric-id'?: number;
  id?: string;
}

export interface WikibaseEntityIdDataValue {
  type: 'wikibase-entityid';
  value: WikibaseEntityIdValue;
}

export interface QuantityValue {
  amount: string;
  upperBound?: string;
  lowerBound?: string;
  unit: string;
}

export interface QuantityDataValue {
  type: 'quantity';
  value: QuantityValue;
}

export interface TimeValue {
  time: string;
  timezone: number;
  before: number;
  after: number;
  precision: number;
  calendarmodel: string;
}

export interface TimeDataValue {
  type: 'time';
  value: TimeValue;
}

export interface MonolingualTextValue {
  language: string;
  text: string;
}

export interface MonolingualTextDataValue {
  type: 'monolingualtext';
  value: MonolingualTextValue;
}

export interface GlobeCoordinateValue {
  latitude: number;
  longitude: number;
  altitude?: number | null;
  precision: number | null;
  globe: string;
}

export interface GlobeCoordinateDataValue {
  type: 'globecoordinate';
  value: GlobeCoordinateValue;
}

export type DataValue =
  | StringDataValue
  | WikibaseEntityIdDataValue
  | QuantityDataValue
  | TimeDataValue
  | MonolingualTextDataValue
  | GlobeCoordinateDataValue;

export type DataValueType = DataValue['type'];

export interface ValueSnak {
  snaktype: 'value';
  property: string;
  hash?: string;
  datavalue: DataValue;
  datatype: string;
}

export interface SomeValueSnak {
  snaktype: 'somevalue';
  property: string;
  hash?: string;
  datatype?: string;
}

export interface NoValueSnak {
  snaktype: 'novalue';
  property: string;
  hash?: string;
  datatype?: string;
}

export type Snak = ValueSnak | SomeValueSnak | NoValueSnak;

export type SnakGroups = Record<string, Snak[]>;

export interface Reference {
  hash?: string;
  snaks: SnakGroups;
  'snaks-order': string[];
}

export interface Statement {
  id: string;
  type: 'statement';
  rank: Rank;
  mainsnak: Snak;
  qualifiers?: SnakGroups;
  'qualifiers-order'?: string[];
  references?: Reference[];
}

export type Claims = Record<string, Statement[]>;

export interface Item {
  type: 'item';
  id: string;
  lastrevid: number;
  claims: Claims;
}

export interface Property {
  type: 'property';
  id: string;
  lastrevid: number;
  datatype: string;
  claims: Claims;
}

export type Entity = Item | Property;

/**
 * Placeholder for an id the API reports as missing or deleted
 */
export interface MissingEntity {
  id: string;
  missing: true;
}

export function isMissingEntity(entity: Entity | MissingEntity): entity is MissingEntity {
  return 'missing' in entity;
}
