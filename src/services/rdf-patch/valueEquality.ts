/**
 * Value equality used for every "already present" / "unchanged" decision.
 * Structural equality except for entity id aliases and unitless or
 * boundless quantities.
 */

import { isDeepStrictEqual } from 'node:util';
import type { DataValue, QuantityValue, Reference, Snak, WikibaseEntityIdValue } from '../../types/wikibase.js';

const UNITLESS_UNITS = new Set(['1', 'https://www.wikidata.org/wiki/Q199']);

function entityIdEquals(a: WikibaseEntityIdValue, b: WikibaseEntityIdValue): boolean {
  if (a['entity-type'] !== b['entity-type']) {
    return false;
  }
  if (a['numeric-id'] !== undefined && b['numeric-id'] !== undefined) {
    return a['numeric-id'] === b['numeric-id'];
  }
  if (a.id !== undefined && b.id !== undefined) {
    return a.id === b.id;
  }
  return false;
}

function hasBounds(value: QuantityValue): boolean {
  return value.upperBound !== undefined || value.lowerBound !== undefined;
}

function quantityEquals(a: QuantityValue, b: QuantityValue): boolean {
  if (hasBounds(a) !== hasBounds(b)) {
    return a.amount === b.amount;
  }
  if (UNITLESS_UNITS.has(a.unit) && UNITLESS_UNITS.has(b.unit)) {
    return a.amount === b.amount;
  }
  return isDeepStrictEqual(a, b);
}

export function dataValueEquals(a: DataValue, b: DataValue): boolean {
  if (a.type === 'wikibase-entityid' && b.type === 'wikibase-entityid') {
    return entityIdEquals(a.value, b.value);
  }
  if (a.type === 'quantity' && b.type === 'quantity') {
    return quantityEquals(a.value, b.value);
  }
  return isDeepStrictEqual(a, b);
}

export function snakEquals(a: Snak, b: Snak): boolean {
  if (a.snaktype !== b.snaktype || a.property !== b.property) {
    return false;
  }
  if (a.snaktype === 'value' && b.snaktype === 'value') {
    return dataValueEquals(a.datavalue, b.datavalue);
  }
  return true;
}

export function anySnakEquals(snaks: readonly Snak[], snak: Snak): boolean {
  return snaks.some((other) => snakEquals(other, snak));
}

/**
 * The list holds exactly one snak and it equals `snak`
 */
export function onlySnakEquals(snaks: readonly Snak[], snak: Snak): boolean {
  return snaks.length === 1 && snakEquals(snaks[0], snak);
}

export function snakListEquals(a: readonly Snak[], b: readonly Snak[]): boolean {
  return a.length === b.length && a.every((snak, i) => snakEquals(snak, b[i]));
}

export function referenceEquals(a: Reference, b: Reference): boolean {
  if (!isDeepStrictEqual(a['snaks-order'], b['snaks-order'])) {
    return false;
  }
  return a['snaks-order'].every((pid) => snakListEquals(a.snaks[pid] ?? [], b.snaks[pid] ?? []));
}

export function anyReferenceEquals(references: readonly Reference[], reference: Reference): boolean {
  return references.some((other) => referenceEquals(other, reference));
}
