/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Normalize an EXPRESS type or enumeration name to the form written in
 * STEP files: surrounding whitespace removed, upper case.
 *
 * 'Cartesian_Point' -> 'CARTESIAN_POINT'
 */
export function normalizeName(name: string): string {
  return name.trim().toUpperCase();
}
