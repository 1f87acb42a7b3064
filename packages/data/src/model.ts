/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * In-memory model of ISO 10303-21 entity data.
 *
 * Entities are plain values: they have no id until the export compiler
 * numbers them, and two entities that render to the same text are the
 * same record in the written file.
 */

/** `$` - value explicitly absent */
export interface NullAttribute {
  kind: 'null';
}

/** `*` - value supplied by a derivation rule */
export interface DerivedAttribute {
  kind: 'derived';
}

/** 64-bit signed integer literal */
export interface IntegerAttribute {
  kind: 'integer';
  value: number | bigint;
}

/** Real literal, always written with a decimal point */
export interface RealAttribute {
  kind: 'real';
  value: number;
}

/** Simple string, escaped on write */
export interface TextAttribute {
  kind: 'text';
  value: string;
}

/** Binary literal; `value` is already hex-encoded */
export interface BinaryAttribute {
  kind: 'binary';
  value: string;
}

/** `.NAME.` */
export interface EnumerationAttribute {
  kind: 'enumeration';
  value: string;
}

/** `.T.` / `.F.` */
export interface BooleanAttribute {
  kind: 'boolean';
  value: boolean;
}

/** SELECT wrapper: `TYPENAME(value)` */
export interface TypedAttribute {
  kind: 'typed';
  typeName: string;
  value: Attribute;
}

/** Aggregate: `(a,b,...)` */
export interface ListAttribute {
  kind: 'list';
  items: Attribute[];
}

/** Embedded entity, written as `#id` once compiled */
export interface ReferenceAttribute {
  kind: 'reference';
  entity: Entity;
}

export type Attribute =
  | NullAttribute
  | DerivedAttribute
  | IntegerAttribute
  | RealAttribute
  | TextAttribute
  | BinaryAttribute
  | EnumerationAttribute
  | BooleanAttribute
  | TypedAttribute
  | ListAttribute
  | ReferenceAttribute;

export type AttributeKind = Attribute['kind'];

export interface Entity {
  /** Upper-case EXPRESS entity name, e.g. CARTESIAN_POINT */
  typeName: string;
  attributes: Attribute[];
}

export const ATTRIBUTE_KINDS: readonly AttributeKind[] = [
  'null',
  'derived',
  'integer',
  'real',
  'text',
  'binary',
  'enumeration',
  'boolean',
  'typed',
  'list',
  'reference',
];

/**
 * Shallow shape check: has a known `kind` tag.
 * Payloads are checked by whoever builds the value (see the CLI reader).
 */
export function isAttribute(value: unknown): value is Attribute {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  const kind = value.kind;
  return typeof kind === 'string' && ATTRIBUTE_KINDS.some(k => k === kind);
}

export function isEntity(value: unknown): value is Entity {
  return (
    typeof value === 'object' &&
    value !== null &&
    'typeName' in value &&
    typeof value.typeName === 'string' &&
    'attributes' in value &&
    Array.isArray(value.attributes)
  );
}
