/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { AttributeKind } from '@p21kit/data';

/** Thrown when an attribute value has no STEP literal (NaN, out-of-range integer) */
export class StepValueError extends Error {
  constructor(
    message: string,
    public readonly kind: AttributeKind,
    public readonly value: number | bigint,
  ) {
    super(message);
    this.name = 'StepValueError';
  }
}

/**
 * Thrown when an entity is reachable from itself through reference
 * attributes. `chain` lists type names from the re-entered entity back
 * to itself, e.g. ['A', 'B', 'A'].
 */
export class CircularReferenceError extends Error {
  constructor(public readonly chain: string[]) {
    super(`Circular entity reference: ${chain.join(' -> ')}`);
    this.name = 'CircularReferenceError';
  }
}
