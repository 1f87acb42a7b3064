/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Attribute -> STEP attribute text.
 *
 * Reference attributes are written as #id; the id comes from the caller's
 * resolver, which is how the entity compiler numbers embedded entities.
 */

import type { Attribute, Entity } from '@p21kit/data';
import { encodeStepString } from '@p21kit/encoding';
import { StepValueError } from './errors.js';

export type ReferenceResolver = (entity: Entity) => number;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function formatInteger(value: number | bigint): string {
  if (typeof value === 'bigint') {
    if (value < INT64_MIN || value > INT64_MAX) {
      throw new StepValueError(`Integer ${value} is outside the 64-bit range`, 'integer', value);
    }
    return value.toString();
  }
  if (!Number.isSafeInteger(value)) {
    throw new StepValueError(`Integer ${value} is not a safe integer; pass a bigint`, 'integer', value);
  }
  // String(-0) is '0'
  return String(value);
}

/**
 * Shortest round-trip decimal, always with a '.'.
 * 2 -> '2.', 2.5 -> '2.5', 1e21 -> '1.E21', 1.5e-7 -> '1.5E-7'
 */
export function formatReal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new StepValueError(`Real ${value} has no STEP representation`, 'real', value);
  }
  const str = String(value);
  const e = str.indexOf('e');
  if (e === -1) {
    return str.includes('.') ? str : str + '.';
  }
  const mantissa = str.slice(0, e);
  const exponent = str.slice(e + 1).replace('+', '');
  return `${mantissa.includes('.') ? mantissa : mantissa + '.'}E${exponent}`;
}

/**
 * Render one attribute.
 */
export function formatAttribute(attribute: Attribute, resolveReference: ReferenceResolver): string {
  switch (attribute.kind) {
    case 'null':
      return '$';
    case 'derived':
      return '*';
    case 'integer':
      return formatInteger(attribute.value);
    case 'real':
      return formatReal(attribute.value);
    case 'text':
      return `'${encodeStepString(attribute.value)}'`;
    case 'binary':
      return `"${attribute.value}"`;
    case 'enumeration':
      return `.${attribute.value}.`;
    case 'boolean':
      return attribute.value ? '.T.' : '.F.';
    case 'typed':
      return `${attribute.typeName}(${formatAttribute(attribute.value, resolveReference)})`;
    case 'list':
      return `(${attribute.items.map(item => formatAttribute(item, resolveReference)).join(',')})`;
    case 'reference':
      return `#${resolveReference(attribute.entity)}`;
  }
}

/** Comma-joined attribute list, without the surrounding parentheses */
export function formatAttributes(attributes: Attribute[], resolveReference: ReferenceResolver): string {
  return attributes.map(attribute => formatAttribute(attribute, resolveReference)).join(',');
}
