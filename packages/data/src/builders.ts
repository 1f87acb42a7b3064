/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Attribute and entity builders.
 *
 * Names passed to `entity`, `enumeration` and `typed` go through
 * normalizeName; the export core expects them upper-case.
 */

import type {
  Attribute,
  BinaryAttribute,
  BooleanAttribute,
  DerivedAttribute,
  Entity,
  EnumerationAttribute,
  IntegerAttribute,
  ListAttribute,
  NullAttribute,
  RealAttribute,
  ReferenceAttribute,
  TextAttribute,
  TypedAttribute,
} from './model.js';
import { normalizeName } from './names.js';

const NULL: NullAttribute = { kind: 'null' };
const DERIVED: DerivedAttribute = { kind: 'derived' };

/** `$` */
export function nul(): NullAttribute {
  return NULL;
}

/** `*` */
export function derived(): DerivedAttribute {
  return DERIVED;
}

export function int(value: number | bigint): IntegerAttribute {
  return { kind: 'integer', value };
}

export function real(value: number): RealAttribute {
  return { kind: 'real', value };
}

export function text(value: string): TextAttribute {
  return { kind: 'text', value };
}

/** Wrap an already hex-encoded bit pattern */
export function binary(hex: string): BinaryAttribute {
  return { kind: 'binary', value: hex };
}

export function enumeration(name: string): EnumerationAttribute {
  return { kind: 'enumeration', value: normalizeName(name) };
}

export function bool(value: boolean): BooleanAttribute {
  return { kind: 'boolean', value };
}

export function typed(typeName: string, value: Attribute): TypedAttribute {
  return { kind: 'typed', typeName: normalizeName(typeName), value };
}

export function list(items: Attribute[]): ListAttribute {
  return { kind: 'list', items };
}

export function ref(target: Entity): ReferenceAttribute {
  return { kind: 'reference', entity: target };
}

/**
 * Shorthand for a list of reals, the most common aggregate in geometry
 * (e.g. CARTESIAN_POINT coordinates).
 */
export function reals(values: number[]): ListAttribute {
  return list(values.map(real));
}

/** Shorthand for a list of text values */
export function texts(values: string[]): ListAttribute {
  return list(values.map(text));
}

export function entity(typeName: string, ...attributes: Attribute[]): Entity {
  return { typeName: normalizeName(typeName), attributes };
}
