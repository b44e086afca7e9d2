/**
 * Positional identity alignment — re-keys a side's unnamed units against
 * Base so a deletion or insertion does not shift every later
 * `anonymous-at-position-<n>` key.
 *
 * Pure: returns new Unit objects, never mutates its inputs.
 */

import { diffArrays } from 'diff';
import { ANONYMOUS_KEY_PREFIX, isAnonymousKey } from './extract.js';
import type { Unit } from './shared.js';

/**
 * Key for an unnamed unit the side inserted after `anchor` Base unnamed
 * units; `offset` counts from 1 within the inserted run. Both sides
 * inserting at the same place share keys, so differing inserts conflict.
 */
function insertedKey(anchor: number, offset: number): string {
  return `${ANONYMOUS_KEY_PREFIX}${anchor}+${offset}`;
}

/**
 * Give each unnamed unit of `side` the key of the Base unit it lines up
 * with. Units are matched by content hash in order; a removed run
 * directly replaced by an inserted run of the same length is paired
 * position by position (a modification). Remaining inserted units get
 * keys anchored on the Base position they follow.
 */
export function alignAnonymousUnits(base: Unit[], side: Unit[]): Unit[] {
  const baseAnon = base.filter(u => isAnonymousKey(u.key));
  const sideAnon = side.filter(u => isAnonymousKey(u.key));
  if (sideAnon.length === 0) return side;

  const changes = diffArrays(baseAnon.map(u => u.hash), sideAnon.map(u => u.hash));
  const keys = new Map<Unit, string>();

  let baseIndex = 0;
  let sideIndex = 0;
  for (let i = 0; i < changes.length; i++) {
    const change = changes[i];
    const count = change.value.length;

    if (!change.added && !change.removed) {
      for (let k = 0; k < count; k++) keys.set(sideAnon[sideIndex + k], baseAnon[baseIndex + k].key);
      baseIndex += count;
      sideIndex += count;
      continue;
    }

    const next = changes[i + 1];
    const replaced = next !== undefined
      && next.value.length === count
      && ((change.removed && next.added) || (change.added && next.removed));
    if (replaced) {
      for (let k = 0; k < count; k++) keys.set(sideAnon[sideIndex + k], baseAnon[baseIndex + k].key);
      baseIndex += count;
      sideIndex += count;
      i++;
      continue;
    }

    if (change.removed) {
      baseIndex += count;
    } else {
      for (let k = 0; k < count; k++) keys.set(sideAnon[sideIndex + k], insertedKey(baseIndex, k + 1));
      sideIndex += count;
    }
  }

  return side.map(unit => {
    const key = keys.get(unit);
    return key === undefined || key === unit.key ? unit : { ...unit, key };
  });
}
